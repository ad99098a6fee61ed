import type { SMTPError } from "./types.ts";

export function createSMTPError(responseCode: number, message: string, code?: string): SMTPError {
	return Object.assign(new Error(message), code === undefined ? { responseCode } : { responseCode, code });
}
