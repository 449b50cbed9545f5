import { describe, expect, it } from "vitest";
import { FlightManagement } from "../flightManagement.js";
import { DecodeError } from "../route/errors.js";
import { navigationData } from "../route/__tests__/fixtures.js";

describe("FlightManagement", () => {
  it("has no route until one is decoded", () => {
    const fms = new FlightManagement(navigationData());
    expect(fms.route).toBeUndefined();
    expect(fms.totals()).toBeUndefined();
    expect(fms.alternateLeg()).toBeUndefined();
  });

  it("keeps the decoded route", () => {
    const fms = new FlightManagement(navigationData());
    const route = fms.decode("N0107 A025 EDDH P2 EDHF");

    expect(fms.route).toBe(route);
    expect(fms.totals()?.distance).toBe(route.totals().distance);
  });

  it("drops the previous route when a new one fails to decode", () => {
    const fms = new FlightManagement(navigationData());
    fms.decode("EDDH EDHF");

    expect(() => fms.decode("EDDH ZZZZ")).toThrow("Unknown airport ZZZZ");
    expect(fms.route).toBeUndefined();
    expect(fms.totals()).toBeUndefined();
  });

  it("decodes again when the context changes", () => {
    const fms = new FlightManagement(navigationData());
    fms.decode("N0107 A025 01005KT EDDH EDHF");
    expect(fms.route?.legs[0].magneticCourse).toBeUndefined();

    const route = fms.setContext({ date: new Date("2024-06-01T00:00:00Z"), magneticModel: { declination: () => 0 } });
    expect(route?.legs[0].magneticCourse).toBeCloseTo(route?.legs[0].trueCourse ?? Number.NaN, 9);
  });

  it("decodes again after the navigation data changes", () => {
    const fms = new FlightManagement(navigationData());
    expect(() => fms.decode("EDDH DCT NEW DCT EDHF")).toThrow(DecodeError);

    const route = fms.modifyNavigationData((nav) =>
      nav.addWaypoint({ ident: "NEW", coordinate: { lat: 53.8, lon: 9.8 }, usage: "vfr", region: { kind: "enroute" } })
    );
    expect(route?.legs[0].destination.key).toBe("ENRT/NEW");
    expect(fms.route).toBe(route);
  });

  it("clears the route when it no longer decodes", () => {
    const fms = new FlightManagement(navigationData());
    fms.decode("EDDH HAM EDHF");

    expect(() =>
      fms.modifyNavigationData((nav) => {
        nav.addWaypoint({ ident: "HAM", coordinate: { lat: 53.6, lon: 10.0 }, usage: "vfr", region: { kind: "terminal", area: "EDDH" } });
        nav.addWaypoint({ ident: "HAM", coordinate: { lat: 53.9, lon: 9.6 }, usage: "vfr", region: { kind: "terminal", area: "EDHF" } });
      })
    ).toThrow("HAM exists in terminal areas EDDH and EDHF; use DCT <airport> to pick one");
    expect(fms.route).toBeUndefined();
  });

  describe("alternate", () => {
    it("retargets the final leg at the alternate airport with the final performance", () => {
      const fms = new FlightManagement(navigationData());
      fms.decode("N0107 A025 EDDH 01005KT EDHL");
      fms.setAlternate("EDHF");

      const leg = fms.alternateLeg();
      expect(leg?.origin.key).toBe("EDDH");
      expect(leg?.destination.key).toBe("EDHF");
      expect(leg?.performance.wind).toEqual({ direction: 10, speed: 5 });
      expect(leg?.ete).toBeDefined();
    });

    it("accepts the first enroute waypoint of that name", () => {
      const fms = new FlightManagement(navigationData());
      fms.decode("EDDH EDHF");
      fms.setAlternate("HAM");
      expect(fms.alternateLeg()?.destination.coordinate).toEqual({ lat: 53.68, lon: 10.2 });
    });

    it("accepts a terminal waypoint of the destination's area", () => {
      const fms = new FlightManagement(navigationData());
      fms.decode("EDHF EDDH");
      fms.setAlternate("P2");

      const leg = fms.alternateLeg();
      expect(leg?.origin.key).toBe("EDHF");
      expect(leg?.destination.key).toBe("EDDH/P2");
    });

    it("rejects unknown alternates", () => {
      const fms = new FlightManagement(navigationData());
      expect(() => fms.setAlternate("ZZZ")).toThrow("Unknown alternate ZZZ");
    });

    it("can be removed", () => {
      const fms = new FlightManagement(navigationData());
      fms.decode("EDDH EDHF");
      fms.setAlternate("EDHL");
      fms.setAlternate(undefined);
      expect(fms.alternateLeg()).toBeUndefined();
    });
  });
});
