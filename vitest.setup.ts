import fs from "node:fs";
import path from "node:path";

// Keep global settings reads inside the workspace so tests never pick up
// a developer's ~/.pratidhvani.
const testHome = path.resolve(process.cwd(), ".tmp", "pratidhvani-test-home");
fs.mkdirSync(testHome, { recursive: true });
process.env.PRATIDHVANI_HOME = testHome;
