export const ERR = {
	INVALID_INPUT: "PROTOCOL_INVALID_INPUT",
	MALFORMED: "PROTOCOL_MALFORMED",
	MARKUP_SYNTAX: "PROTOCOL_MARKUP_SYNTAX",
} as const;

export type ProtocolErrorCode = (typeof ERR)[keyof typeof ERR];

export class ProtocolError extends Error {
	code: ProtocolErrorCode;
	details?: unknown;
	constructor(code: ProtocolErrorCode, message: string, details?: unknown) {
		super(message);
		this.name = "ProtocolError";
		this.code = code;
		this.details = details;
	}
}

/** Conflicting or missing arguments to the markup encoder or gadget registry */
export class ProtocolInputError extends ProtocolError {
	constructor(message: string, details?: unknown) {
		super(ERR.INVALID_INPUT, message, details);
		this.name = "ProtocolInputError";
	}
}

/** A gadget tag followed by something other than its output tag */
export class MalformedProtocolError extends ProtocolError {
	constructor(message: string, details?: unknown) {
		super(ERR.MALFORMED, message, details);
		this.name = "MalformedProtocolError";
	}
}

/** Text the tag parser cannot make sense of */
export class MarkupSyntaxError extends ProtocolError {
	constructor(message: string, details?: unknown) {
		super(ERR.MARKUP_SYNTAX, message, details);
		this.name = "MarkupSyntaxError";
	}
}
