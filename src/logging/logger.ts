import { DEBUG_MODE, LOG_LEVEL } from "../config.js";

import { createLogger, type Logger } from "./configLogger.js";

const logger: Logger = createLogger(DEBUG_MODE ? "debug" : LOG_LEVEL);

export default logger;
