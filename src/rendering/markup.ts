const VOID_ELEMENTS = new Set([
	"area",
	"base",
	"br",
	"col",
	"embed",
	"hr",
	"img",
	"input",
	"link",
	"meta",
	"source",
	"track",
	"wbr",
]);

// closing tags browsers infer, generated documents often leave them out
const OPTIONAL_END_ELEMENTS = new Set([
	"p",
	"li",
	"dt",
	"dd",
	"td",
	"th",
	"tr",
	"thead",
	"tbody",
	"tfoot",
	"option",
]);

const RAW_TEXT = /<(style|script)\b[^>]*>[\s\S]*?<\/\1\s*>/gi;
const COMMENT = /<!--[\s\S]*?-->/g;
const TAG = /<(\/?)([a-zA-Z][a-zA-Z0-9-]*)\b[^<>]*?(\/?)>/g;

/**
 * Structural check of generated markup: every non-void element that needs a
 * closing tag gets one, in order. Returns the first problem found.
 */
export function findMarkupProblem(markup: string): string | undefined {
	const source = markup.replace(COMMENT, "").replace(RAW_TEXT, "");
	if (/<!--/.test(source)) {
		return "unterminated comment";
	}

	const open: string[] = [];
	for (const match of source.matchAll(TAG)) {
		const [, closing, rawName, selfClosing] = match;
		const name = rawName.toLowerCase();
		if (VOID_ELEMENTS.has(name)) continue;
		if (!closing) {
			if (!selfClosing) open.push(name);
			continue;
		}
		const index = open.lastIndexOf(name);
		if (index === -1) {
			return `unexpected </${name}>`;
		}
		const skipped = open.slice(index + 1).find((n) => !OPTIONAL_END_ELEMENTS.has(n));
		if (skipped) {
			return `<${skipped}> is not closed before </${name}>`;
		}
		open.length = index;
	}

	const unclosed = open.find((n) => !OPTIONAL_END_ELEMENTS.has(n));
	return unclosed ? `<${unclosed}> is never closed` : undefined;
}

/**
 * Flattens markup to text lines. Headings become `#` prefixed lines, list
 * items `• ` prefixed ones and horizontal rules `---`.
 */
export function htmlToText(html: string): string {
	let text = html.replace(COMMENT, "").replace(RAW_TEXT, "");
	text = text.replace(/<head[^>]*>[\s\S]*?<\/head>/gi, "");

	text = text.replace(/<h1[^>]*>([\s\S]*?)<\/h1>/gi, "\n# $1\n");
	text = text.replace(/<h2[^>]*>([\s\S]*?)<\/h2>/gi, "\n## $1\n");
	text = text.replace(/<h[3-6][^>]*>([\s\S]*?)<\/h[3-6]>/gi, "\n### $1\n");

	text = text.replace(/<hr\s*\/?>/gi, "\n---\n");
	text = text.replace(/<br\s*\/?>/gi, "\n");
	text = text.replace(/<\/p>/gi, "\n\n");
	text = text.replace(/<p[^>]*>/gi, "\n");
	text = text.replace(/<\/?div[^>]*>/gi, "\n");

	text = text.replace(/<li[^>]*>/gi, "\n• ");
	text = text.replace(/<\/li>/gi, "\n");
	text = text.replace(/<\/?(ul|ol)[^>]*>/gi, "\n");

	text = text.replace(/<\/t[dh]>/gi, "  ");
	text = text.replace(/<\/tr>/gi, "\n");
	text = text.replace(/<\/?table[^>]*>/gi, "\n");

	text = text.replace(/<[^>]+>/g, "");

	text = text.replace(/&nbsp;/g, " ");
	text = text.replace(/&lt;/g, "<");
	text = text.replace(/&gt;/g, ">");
	text = text.replace(/&quot;/g, '"');
	text = text.replace(/&#39;/g, "'");
	text = text.replace(/&amp;/g, "&");

	return text
		.split("\n")
		.map((line) => line.replace(/[ \t]+/g, " ").trim())
		.join("\n")
		.replace(/\n{3,}/g, "\n\n")
		.trim();
}
