import pino from "pino";
import { config } from "../config";

export const logger = pino({
	name: "setup-radar",
	level: config.logLevel,
	base: undefined,
	timestamp: pino.stdTimeFunctions.isoTime,
});
