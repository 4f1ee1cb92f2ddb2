import { devWarn } from "../../shared/index.js";

/** Page texts joined by blank lines; pages without text are skipped. */
export async function extractPdfText(bytes: Buffer, fileName: string): Promise<string> {
  const { getDocument } = await import("pdfjs-dist/legacy/build/pdf.mjs");

  const loadingTask = getDocument({
    data: new Uint8Array(bytes),
    useWorkerFetch: false,
    isEvalSupported: false,
    disableFontFace: true,
  });
  const pdfDoc = await loadingTask.promise;

  try {
    const pages: string[] = [];
    for (let pageNumber = 1; pageNumber <= pdfDoc.numPages; pageNumber++) {
      const page = await pdfDoc.getPage(pageNumber);
      const textContent = await page.getTextContent();
      const text = textContent.items
        .map((item) => ("str" in item ? item.str : ""))
        .join(" ")
        .replace(/\s+/g, " ")
        .trim();
      if (text.length > 0) pages.push(text);
    }

    if (pages.length === 0) {
      devWarn(`No extractable text in ${fileName}; it may be a scanned document`);
    }
    return pages.join("\n\n");
  } finally {
    await pdfDoc.destroy();
  }
}
