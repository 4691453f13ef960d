import { mkdtempSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";

// Quiet logs and keep stored preferences out of the user's config directory
process.env.LOG_LEVEL = "error";
process.env.FORMCRAFT_CONFIG_DIR = mkdtempSync(join(tmpdir(), "formcraft-test-"));

// Tests opt into the external generator explicitly
delete process.env.USE_EXTERNAL_GENERATOR;
delete process.env.OUTPUT_DIR;
