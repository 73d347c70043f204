import dotenv from "dotenv";
import { startDaemon } from "./app";
import { loadConfig } from "./config";
import { configureLog, errorFields, flushLog, log } from "./util/log";

dotenv.config();

const main = async (): Promise<number> => {
  const config = loadConfig();
  configureLog({ level: config.logLevel, file: config.logFile });
  return await startDaemon(config);
};

void main()
  .catch((e: unknown) => {
    log.error("speech daemon crashed", errorFields(e));
    return 1;
  })
  .then(async (code) => {
    await flushLog();
    // a pending read on the inbound FIFO would otherwise hold the process open
    process.exit(code);
  });
