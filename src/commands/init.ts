import { loadConfig } from "../config.js";
import { logger } from "../logger.js";
import { LandholderStore } from "../services/landholderStore.js";

export async function initCmd(database?: string): Promise<void> {
  const location = database ?? loadConfig().DATABASE_PATH;
  const store = new LandholderStore(location);
  try {
    logger.info({ database: location, rows: store.count() }, "init: schema ready");
  } finally {
    store.close();
  }
}
