export function extractPlainText(buffer: Buffer): string {
  // trim() also drops a leading byte-order mark
  return buffer.toString("utf8").trim();
}
