import { readFile } from "node:fs/promises";
import { getDocumentProxy } from "unpdf";

/** Extracts the text of every page, one page per line block. */
export async function extractPdfText(filePath: string): Promise<string> {
  const buffer = await readFile(filePath);
  const pdf = await getDocumentProxy(new Uint8Array(buffer));

  const pages: string[] = [];
  try {
    for (let i = 1; i <= pdf.numPages; i++) {
      const page = await pdf.getPage(i);
      const textContent = await page.getTextContent();
      pages.push(
        textContent.items.map((item) => ("str" in item ? item.str : "")).join(" "),
      );
    }
  } finally {
    await pdf.destroy();
  }

  return pages.join("\n");
}
