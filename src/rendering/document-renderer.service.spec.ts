import { Test } from "@nestjs/testing";
import { PDFDocument } from "pdf-lib";
import { sha256 } from "@noble/hashes/sha2";
import { bytesToHex } from "@noble/hashes/utils";
import { DocumentRendererService } from "./document-renderer.service";

describe("DocumentRendererService", () => {
	let service: DocumentRendererService;

	beforeEach(async () => {
		const moduleRef = await Test.createTestingModule({
			providers: [DocumentRendererService],
		}).compile();

		service = moduleRef.get(DocumentRendererService);
	});

	it("should render markup to a pdf with its digest", async () => {
		const result = await service.render(
			"<h1>Rental Contract</h1><p>Owner: Sami</p><p>Client: Amal</p>",
		);

		expect(Buffer.from(result.pdf.subarray(0, 5)).toString("latin1")).toBe("%PDF-");
		expect(result.pageCount).toBe(1);
		expect(result.digest).toBe(bytesToHex(sha256(result.pdf)));

		const parsed = await PDFDocument.load(result.pdf);
		expect(parsed.getTitle()).toBe("Rental Contract");
		expect(parsed.getPageCount()).toBe(1);
	});

	it("should continue on new pages", async () => {
		const body = Array.from(
			{ length: 200 },
			(_, i) => `<p>Clause ${i + 1}: the client returns the equipment clean.</p>`,
		).join("");

		const result = await service.render(`<h1>Terms</h1>${body}`);

		expect(result.pageCount).toBeGreaterThan(1);
	});

	it("should replace characters the font cannot encode", async () => {
		const result = await service.render("<p>Signed ✓ 契約 café</p>");

		expect(result.pageCount).toBe(1);
	});

	it("should fail with RENDER_FAILED on malformed markup", async () => {
		await expect(service.render("<div><p>Hi</p>")).rejects.toMatchObject({
			code: "RENDER_FAILED",
			detail: "Malformed contract markup: <div> is never closed",
		});
	});

	it("should fail with RENDER_FAILED when there is nothing to render", async () => {
		await expect(service.render("<div> </div>")).rejects.toMatchObject({
			code: "RENDER_FAILED",
			detail: "Contract markup has no text content",
		});
	});
});
