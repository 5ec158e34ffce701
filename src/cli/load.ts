/**
 * Data directory resolution shared by the CLI commands.
 */

import { resolve } from "node:path";
import type { Data } from "../data/data.js";
import { loadData } from "../data/loader.js";
import { errorMessage } from "../validate/error-log.js";

export const DEFAULT_DATA_DIR = process.env["ROSTER_DATA"] ?? process.cwd();

/**
 * Load the data directory, printing the load failure and setting the exit
 * code when it can't be read.
 */
export async function loadOrReport(dataDir: string): Promise<Data | undefined> {
  try {
    return await loadData(resolve(dataDir));
  } catch (err) {
    console.error(`❌ ${errorMessage(err)}`);
    process.exitCode = 1;
    return undefined;
  }
}
