export {
	addressLiteral,
	parseAddressLiteral,
	parseAddressLiteralContent,
	upgradeAddressLiteral,
} from "./src/address-literal.ts";
export { parseAddressCommand } from "./src/address-parser.ts";
export {
	isAlphanumeric,
	isAtext,
	isDcontent,
	isDigit,
	isEsmtpValueChar,
	isHexDigit,
	isLdh,
	isQtext,
	isQuotedPairChar,
	isWsp,
} from "./src/charsets.ts";
export { parseMailCommand, parseRcptCommand, validateAddress } from "./src/commands.ts";
export {
	decodeXtext,
	encodeXtext,
	interpretMailParams,
	interpretRcptParams,
	parseNotify,
	parseOrcpt,
} from "./src/dsn.ts";
export { createSMTPError } from "./src/errors.ts";
export { esmtpParam, esmtpParams, parseEsmtpParams } from "./src/esmtp-params.ts";
export {
	formatAddressLiteral,
	formatDomainPart,
	formatEsmtpParams,
	formatLocalPart,
	formatMailbox,
	formatPath,
	formatReversePath,
} from "./src/format.ts";
export { formatIPv6 } from "./src/ip.ts";
export { domain, domainPart, localPart, mailbox, parseMailbox } from "./src/mailbox.ts";
export { forwardPath, path, reversePath } from "./src/path.ts";
export type { Match, Rule } from "./src/scanner.ts";
export type * from "./src/types.ts";
