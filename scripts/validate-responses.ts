import path from "path";
import { config } from "../src/lib/config.js";
import { validateResponseFile } from "../src/responses/config-store.js";

const filePath = path.resolve(process.argv[2] || config.responsesPath);

const check = validateResponseFile(filePath);

if (!check.valid) {
  console.error(`Invalid: ${filePath}`);
  console.error(`  ${check.error.message}`);
  process.exit(1);
}

console.log(`Valid: ${filePath}`);
for (const [emotion, records] of Object.entries(check.configuration)) {
  console.log(`  ${emotion}: ${records.length} record(s): ${records.map((r) => r.figure).join(", ")}`);
}
