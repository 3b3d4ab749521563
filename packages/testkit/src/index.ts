export { createTempDir, removeDir, writeDataFile } from "./fs.js";
export { SAMPLE_RECORDS, sampleRecords, buildRegistry } from "./fixtures.js";
export { captureConsole } from "./console.js";
export type { CapturedOutput } from "./console.js";
