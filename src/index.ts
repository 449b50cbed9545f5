import express from "express";
import bodyParser from "body-parser";
import { createApi } from "./api.js";
import { config } from "./config.js";
import { openDatabase } from "./db.js";
import { SqliteNavigationData } from "./dbHelpers.js";

const db = openDatabase(config.dbPath);
const nav = new SqliteNavigationData(db);

const app = express();

app.use(bodyParser.json({ limit: "10mb" }));
app.use(createApi(nav));

app.listen(config.port, () => console.log(`Route decoder listening on :${config.port} (navdata ${config.dbPath})`));
