import pino from "pino";

import { LOG_LEVEL, SERVICE_NAME } from "./config";

export const logger = pino({ name: SERVICE_NAME, level: LOG_LEVEL });
