import { DocumentFormat, ImageFormat } from "@aws-sdk/client-bedrock-runtime";

// ---------------------------------------------------------------------------
// MIME type → Converse format tables. The two key sets are disjoint.
// ---------------------------------------------------------------------------

export const IMAGE_FORMATS: ReadonlyMap<string, ImageFormat> = new Map<string, ImageFormat>([
  ["image/png", ImageFormat.PNG],
  ["image/jpeg", ImageFormat.JPEG],
  ["image/gif", ImageFormat.GIF],
  ["image/webp", ImageFormat.WEBP],
]);

export const DOCUMENT_FORMATS: ReadonlyMap<string, DocumentFormat> = new Map<string, DocumentFormat>([
  ["application/pdf", DocumentFormat.PDF],
  ["text/csv", DocumentFormat.CSV],
  ["application/msword", DocumentFormat.DOC],
  ["application/vnd.openxmlformats-officedocument.wordprocessingml.document", DocumentFormat.DOCX],
  ["application/vnd.ms-excel", DocumentFormat.XLS],
  ["application/vnd.openxmlformats-officedocument.spreadsheetml.sheet", DocumentFormat.XLSX],
  ["text/html", DocumentFormat.HTML],
  ["text/plain", DocumentFormat.TXT],
  ["text/markdown", DocumentFormat.MD],
]);

/** Exact, case-sensitive match; parameters such as `;charset=` are not stripped. */
export function lookupImageFormat(mimeType: string): ImageFormat | undefined {
  return IMAGE_FORMATS.get(mimeType);
}

export function lookupDocumentFormat(mimeType: string): DocumentFormat | undefined {
  return DOCUMENT_FORMATS.get(mimeType);
}
