/** Quote a value as a Typst string literal. */
export function typstString(value: string): string {
	const escaped = value
		.replace(/\\/g, "\\\\")
		.replace(/"/g, '\\"')
		.replace(/\r?\n/g, "\\n");
	return `"${escaped}"`;
}

/** Inverse of typstString for the escapes it produces. */
export function parseTypstString(literal: string): string | null {
	const trimmed = literal.trim();
	if (trimmed.length < 2 || !trimmed.startsWith('"') || !trimmed.endsWith('"')) {
		return null;
	}
	return trimmed
		.slice(1, -1)
		.replace(/\\(["\\n])/g, (_match, ch: string) => (ch === "n" ? "\n" : ch));
}

/**
 * Index just past the comment that starts at `index`, or -1 when none does.
 * A line comment ends before its newline; block comments nest and an
 * unterminated one runs to the end of the source.
 */
export function commentEnd(source: string, index: number): number {
	if (source[index] !== "/") return -1;
	const next = source[index + 1];
	if (next === "/") {
		const lineEnd = source.indexOf("\n", index);
		return lineEnd === -1 ? source.length : lineEnd;
	}
	if (next !== "*") return -1;
	let depth = 0;
	let i = index;
	while (i < source.length) {
		if (source[i] === "/" && source[i + 1] === "*") {
			depth++;
			i += 2;
		} else if (source[i] === "*" && source[i + 1] === "/") {
			depth--;
			i += 2;
			if (depth === 0) return i;
		} else {
			i++;
		}
	}
	return source.length;
}

/**
 * Body of the argument list that starts at `openIndex` (the "(" itself),
 * or null when the parentheses never balance. Skips over string literals
 * and comments.
 */
export function readArgumentList(source: string, openIndex: number): string | null {
	let depth = 0;
	let inString = false;
	for (let i = openIndex; i < source.length; i++) {
		const ch = source[i];
		if (inString) {
			if (ch === "\\") i++;
			else if (ch === '"') inString = false;
			continue;
		}
		const end = commentEnd(source, i);
		if (end !== -1) {
			i = end - 1;
		} else if (ch === '"') {
			inString = true;
		} else if (ch === "(" || ch === "[" || ch === "{") {
			depth++;
		} else if (ch === ")" || ch === "]" || ch === "}") {
			depth--;
			if (depth === 0) return source.slice(openIndex + 1, i);
		}
	}
	return null;
}

/** Split an argument list on its top-level commas. */
export function splitArguments(list: string): string[] {
	const args: string[] = [];
	let depth = 0;
	let inString = false;
	let start = 0;
	for (let i = 0; i < list.length; i++) {
		const ch = list[i];
		if (inString) {
			if (ch === "\\") i++;
			else if (ch === '"') inString = false;
			continue;
		}
		if (ch === '"') inString = true;
		else if (ch === "(" || ch === "[" || ch === "{") depth++;
		else if (ch === ")" || ch === "]" || ch === "}") depth--;
		else if (ch === "," && depth === 0) {
			args.push(list.slice(start, i));
			start = i + 1;
		}
	}
	args.push(list.slice(start));
	return args.map((arg) => arg.trim()).filter((arg) => arg.length > 0);
}

/**
 * Remove `//` and `/* *\/` comments that are not inside a string literal.
 * Newlines inside a block comment are kept so line positions survive.
 */
export function stripComments(source: string): string {
	let result = "";
	let inString = false;
	for (let i = 0; i < source.length; i++) {
		const ch = source[i];
		if (inString) {
			result += ch;
			if (ch === "\\" && i + 1 < source.length) {
				result += source[i + 1];
				i++;
			} else if (ch === '"') {
				inString = false;
			}
			continue;
		}
		const end = commentEnd(source, i);
		if (end !== -1) {
			result += source.slice(i, end).replace(/[^\n]/g, "");
			i = end - 1;
			continue;
		}
		if (ch === '"') inString = true;
		result += ch;
	}
	return result;
}

/** Named arguments (`name: expr`) of an argument list, expressions unparsed. */
export function namedArguments(list: string): Map<string, string> {
	const named = new Map<string, string>();
	for (const arg of splitArguments(stripComments(list))) {
		const match = /^([A-Za-z_][\w-]*)\s*:\s*([\s\S]+)$/.exec(arg);
		if (match?.[1] && match[2]) {
			named.set(match[1], match[2].trim());
		}
	}
	return named;
}
