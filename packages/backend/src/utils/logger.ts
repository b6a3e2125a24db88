import pino from "pino";
import { appConfig } from "../config.js";

export const logger = pino({
  level: appConfig.NODE_ENV === "test" && appConfig.LOG_LEVEL === "info" ? "silent" : appConfig.LOG_LEVEL,
  base: { service: "siteqa" }
});
