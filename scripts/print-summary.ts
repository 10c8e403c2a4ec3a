import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { formatSummary, summarizeStriplog } from "../engine/src/index.js";
import { striplogFromRecords } from "../ingestion/src/api.js";

const DEFAULT_FIXTURE = fileURLToPath(new URL("../fixtures/sample_log.json", import.meta.url));

function printSummary(file: string) {
  const records: unknown = JSON.parse(readFileSync(file, "utf8"));
  if (!Array.isArray(records)) {
    throw new Error(`${file} must hold an array of interval records`);
  }
  const strip = striplogFromRecords(records, { stop: 150, source: file });

  for (const line of formatSummary(summarizeStriplog(strip))) {
    console.log(line);
  }
}

printSummary(process.argv[2] ?? DEFAULT_FIXTURE);
