/**
 * Recursive-descent parser for the JSON-like object literal inside the
 * theming header.
 *
 * Accepts double-quoted, single-quoted and bare keys and scalars, nested
 * objects of any depth, and bracketed arrays (kept as raw text). Entries it
 * cannot read are skipped up to the next `,` or `}` of the enclosing object
 * and reported in `dropped`; parsing never fails as a whole.
 */

export type ConfigValue = string | ConfigObject;
export type ConfigObject = Map<string, ConfigValue>;

export interface ObjectLiteralResult {
	value: ConfigObject;
	/** Source text of the entries that were skipped */
	dropped: string[];
}

const QUOTES = new Set(['"', "'"]);

class ObjectLiteralParser {
	private pos = 0;
	readonly dropped: string[] = [];

	constructor(private readonly source: string) {}

	parseRoot(): ConfigObject {
		this.skipWhitespace();
		if (this.peek() !== "{") {
			if (this.source.trim().length > 0) {
				this.dropped.push(this.source.trim());
			}
			return new Map();
		}
		return this.parseObject();
	}

	private parseObject(): ConfigObject {
		const object: ConfigObject = new Map();
		this.pos++; // "{"

		for (;;) {
			this.skipWhitespace();
			const ch = this.peek();
			if (ch === undefined) {
				return object;
			}
			if (ch === "}") {
				this.pos++;
				return object;
			}
			if (ch === ",") {
				this.pos++;
				continue;
			}

			const entryStart = this.pos;
			const entry = this.parseEntry();
			if (entry) {
				object.set(entry[0], entry[1]);
			} else {
				this.resync();
				const fragment = this.source.slice(entryStart, this.pos).trim();
				if (fragment.length > 0) {
					this.dropped.push(fragment);
				}
			}
		}
	}

	private parseEntry(): [string, ConfigValue] | undefined {
		const key = this.parseKey();
		if (key === undefined || key.length === 0) {
			return undefined;
		}
		this.skipWhitespace();
		if (this.peek() !== ":") {
			return undefined;
		}
		this.pos++;
		this.skipWhitespace();

		const value = this.parseValue();
		if (value === undefined) {
			return undefined;
		}
		this.skipWhitespace();
		const next = this.peek();
		if (next !== undefined && next !== "," && next !== "}") {
			return undefined;
		}
		return [key, value];
	}

	private parseKey(): string | undefined {
		const ch = this.peek();
		if (ch !== undefined && QUOTES.has(ch)) {
			return this.parseQuoted();
		}
		return this.parseBare([":", ",", "{", "}"]);
	}

	private parseValue(): ConfigValue | undefined {
		const ch = this.peek();
		if (ch === "{") {
			return this.parseObject();
		}
		if (ch === "[") {
			return this.parseArrayText();
		}
		if (ch !== undefined && QUOTES.has(ch)) {
			return this.parseQuoted();
		}
		const bare = this.parseBare([",", "}"]);
		return bare !== undefined && bare.length > 0 ? bare : undefined;
	}

	private parseQuoted(): string | undefined {
		const quote = this.source.charAt(this.pos);
		const end = this.source.indexOf(quote, this.pos + 1);
		if (end === -1) {
			return undefined;
		}
		const value = this.source.slice(this.pos + 1, end);
		this.pos = end + 1;
		return value;
	}

	private parseBare(stops: readonly string[]): string | undefined {
		const start = this.pos;
		while (this.pos < this.source.length && !stops.includes(this.source.charAt(this.pos))) {
			this.pos++;
		}
		return this.source.slice(start, this.pos).trim();
	}

	private parseArrayText(): string | undefined {
		const start = this.pos;
		let depth = 0;
		let quote: string | undefined;

		while (this.pos < this.source.length) {
			const ch = this.source.charAt(this.pos);
			this.pos++;
			if (quote) {
				if (ch === quote) quote = undefined;
			} else if (QUOTES.has(ch)) {
				quote = ch;
			} else if (ch === "[") {
				depth++;
			} else if (ch === "]") {
				depth--;
				if (depth === 0) {
					return this.source.slice(start, this.pos);
				}
			}
		}
		return undefined;
	}

	/**
	 * Advance to the next `,` or `}` that belongs to the current object,
	 * stepping over quoted text and nested brackets. The stop character is
	 * left for `parseObject` to consume.
	 */
	private resync(): void {
		let depth = 0;
		let quote: string | undefined;

		while (this.pos < this.source.length) {
			const ch = this.source.charAt(this.pos);
			if (quote) {
				if (ch === quote) quote = undefined;
			} else if (QUOTES.has(ch)) {
				quote = ch;
			} else if (ch === "{" || ch === "[") {
				depth++;
			} else if (ch === "}" || ch === "]") {
				if (depth === 0) return;
				depth--;
			} else if (ch === "," && depth === 0) {
				return;
			}
			this.pos++;
		}
	}

	private skipWhitespace(): void {
		while (this.pos < this.source.length && /\s/.test(this.source.charAt(this.pos))) {
			this.pos++;
		}
	}

	private peek(): string | undefined {
		return this.pos < this.source.length ? this.source.charAt(this.pos) : undefined;
	}
}

/**
 * Parse an object literal such as `{'theme': 'dark', 'themeVariables': {...}}`.
 */
export function parseObjectLiteral(source: string): ObjectLiteralResult {
	const parser = new ObjectLiteralParser(source);
	const value = parser.parseRoot();
	return { value, dropped: parser.dropped };
}
