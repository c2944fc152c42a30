import { Logger } from "@chartscript/logger";
import type { AppLogObj } from "@chartscript/logger";

/**
 * Hidden logger that records every log object, for asserting on debug output.
 */
export function createTestLogger() {
	const logs: Record<string, unknown>[] = [];
	const logger = new Logger<AppLogObj>({
		name: "test",
		type: "hidden",
		minLevel: 0,
	});
	logger.attachTransport((logObj: Record<string, unknown>) => {
		logs.push(logObj);
	});
	return { logger, logs };
}

export function getMsg(logEntry: Record<string, unknown>): string {
	const message = logEntry["0"];
	return typeof message === "string" ? message : "";
}
