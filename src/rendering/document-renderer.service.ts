import { Injectable, Logger } from "@nestjs/common";
import { PDFDocument, PDFFont, PDFPage, StandardFonts, rgb } from "pdf-lib";
import { sha256 } from "@noble/hashes/sha2";
import { bytesToHex } from "@noble/hashes/utils";

import { findMarkupProblem, htmlToText } from "./markup";
import { ContractPipelineError, describeFailure } from "../common/errors";

export type RenderedDocument = {
	pdf: Uint8Array;
	pageCount: number;
	/** hex sha256 of `pdf` */
	digest: string;
};

// US Letter, in points
const PAGE_WIDTH = 612;
const PAGE_HEIGHT = 792;
const MARGIN = 50;
const LINE_HEIGHT = 14;
const FONT_SIZE = 11;
const HEADING_SIZES = [16, 14, 12];

type Fonts = { regular: PDFFont; bold: PDFFont };

/** Lays text out top to bottom, opening a new page when the current one is full. */
class PageCursor {
	private page: PDFPage;
	private y = PAGE_HEIGHT - MARGIN;

	constructor(private readonly doc: PDFDocument) {
		this.page = doc.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
	}

	skip(points: number) {
		this.y -= points;
	}

	write(text: string, font: PDFFont, size: number, indent = 0) {
		if (this.y < MARGIN + size) {
			this.page = this.doc.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
			this.y = PAGE_HEIGHT - MARGIN;
		}
		this.page.drawText(text, {
			x: MARGIN + indent,
			y: this.y,
			size,
			font,
			color: rgb(0, 0, 0),
		});
		this.y -= Math.max(LINE_HEIGHT, size + 4);
	}

	rule() {
		this.y -= LINE_HEIGHT / 2;
		this.page.drawLine({
			start: { x: MARGIN, y: this.y },
			end: { x: PAGE_WIDTH - MARGIN, y: this.y },
			thickness: 0.5,
			color: rgb(0.5, 0.5, 0.5),
		});
		this.y -= LINE_HEIGHT / 2;
	}
}

function wrapText(
	text: string,
	font: PDFFont,
	size: number,
	maxWidth: number,
): string[] {
	const lines: string[] = [];
	let current = "";
	for (const word of text.split(" ")) {
		const candidate = current ? `${current} ${word}` : word;
		if (current && font.widthOfTextAtSize(candidate, size) > maxWidth) {
			lines.push(current);
			current = word;
		} else {
			current = candidate;
		}
	}
	if (current) lines.push(current);
	return lines;
}

/** Standard fonts only cover WinAnsi; anything else is drawn as `?`. */
function toEncodable(text: string, font: PDFFont): string {
	const supported = new Set(font.getCharacterSet());
	return Array.from(text, (ch) => {
		const code = ch.codePointAt(0);
		return ch === "\n" || (code !== undefined && supported.has(code)) ? ch : "?";
	}).join("");
}

@Injectable()
export class DocumentRendererService {
	private readonly logger = new Logger(DocumentRendererService.name);

	async render(markup: string, title = "Rental Contract"): Promise<RenderedDocument> {
		const problem = findMarkupProblem(markup);
		if (problem) {
			throw new ContractPipelineError(
				"RENDER_FAILED",
				`Malformed contract markup: ${problem}`,
			);
		}
		const text = htmlToText(markup);
		if (text === "") {
			throw new ContractPipelineError(
				"RENDER_FAILED",
				"Contract markup has no text content",
			);
		}

		let pdf: Uint8Array;
		let pageCount: number;
		try {
			const doc = await PDFDocument.create();
			const fonts: Fonts = {
				regular: await doc.embedFont(StandardFonts.Helvetica),
				bold: await doc.embedFont(StandardFonts.HelveticaBold),
			};
			this.layout(doc, toEncodable(text, fonts.regular), fonts);
			doc.setTitle(title);
			doc.setCreator("rental-contract-signing");
			// fixed so the same markup renders to the same bytes
			doc.setCreationDate(new Date(0));
			doc.setModificationDate(new Date(0));
			pageCount = doc.getPageCount();
			pdf = await doc.save();
		} catch (err) {
			throw new ContractPipelineError(
				"RENDER_FAILED",
				`PDF rendering failed: ${describeFailure(err)}`,
				{},
				{ cause: err },
			);
		}

		const digest = bytesToHex(sha256(pdf));
		this.logger.log(`Rendered ${pageCount} page(s), ${pdf.length} bytes, sha256 ${digest}`);
		return { pdf, pageCount, digest };
	}

	private layout(doc: PDFDocument, text: string, fonts: Fonts) {
		const cursor = new PageCursor(doc);
		const width = PAGE_WIDTH - MARGIN * 2;

		for (const line of text.split("\n")) {
			const heading = /^(#{1,3}) (.*)$/.exec(line);
			if (heading) {
				const size = HEADING_SIZES[heading[1].length - 1];
				cursor.skip(size / 2);
				for (const part of wrapText(heading[2], fonts.bold, size, width)) {
					cursor.write(part, fonts.bold, size);
				}
			} else if (line === "---") {
				cursor.rule();
			} else if (line.startsWith("• ")) {
				const parts = wrapText(line.slice(2), fonts.regular, FONT_SIZE, width - 20);
				parts.forEach((part, i) =>
					cursor.write(i === 0 ? `• ${part}` : part, fonts.regular, FONT_SIZE, i === 0 ? 8 : 18),
				);
			} else if (line.length > 0) {
				for (const part of wrapText(line, fonts.regular, FONT_SIZE, width)) {
					cursor.write(part, fonts.regular, FONT_SIZE);
				}
			} else {
				cursor.skip(LINE_HEIGHT / 2);
			}
		}
	}
}
