/**
 * Placeholder bytes written at the start of each created file so that the
 * file type is recognizable to tools that sniff magic numbers.
 */
export interface ContentStubProvider {
  /** Stub for a declared kind (a lower-case file extension, without the dot). */
  stubFor(kind: string): Uint8Array;
}

const encoder = new TextEncoder();

// Office Open XML documents are zip containers
const ZIP_HEADER = Uint8Array.of(0x50, 0x4b, 0x03, 0x04);

const DEFAULT_STUBS: Record<string, Uint8Array> = {
  pdf: encoder.encode("%PDF-1.4\n%\u00e2\u00e3\u00cf\u00d3\n"),
  docx: ZIP_HEADER,
  xlsx: ZIP_HEADER,
  pptx: ZIP_HEADER,
  zip: ZIP_HEADER,
  png: Uint8Array.of(0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a),
  jpg: Uint8Array.of(0xff, 0xd8, 0xff, 0xe0),
  jpeg: Uint8Array.of(0xff, 0xd8, 0xff, 0xe0),
  gif: encoder.encode("GIF89a"),
  txt: encoder.encode("Placeholder document.\n"),
  log: encoder.encode("[info] placeholder log\n"),
  md: encoder.encode("# Placeholder\n"),
  csv: encoder.encode("id,name,value\n"),
  json: encoder.encode("{}\n"),
  xml: encoder.encode('<?xml version="1.0" encoding="UTF-8"?>\n'),
  html: encoder.encode("<!DOCTYPE html>\n"),
};

const EMPTY = new Uint8Array(0);

/**
 * Stub provider backed by a kind → bytes table. Unknown kinds get an empty
 * stub. `overrides` replace or extend the built-in table.
 */
export function createContentStubProvider(
  overrides?: Record<string, Uint8Array>,
): ContentStubProvider {
  const table = new Map<string, Uint8Array>(
    Object.entries({ ...DEFAULT_STUBS, ...overrides }),
  );

  return {
    stubFor(kind) {
      return table.get(kind.toLowerCase()) ?? EMPTY;
    },
  };
}

/** "Q3 Report.PDF" → "pdf"; "" when the name has no extension. */
export function kindFromPath(path: string): string {
  const name = path.slice(Math.max(path.lastIndexOf("/"), path.lastIndexOf("\\")) + 1);
  const dot = name.lastIndexOf(".");
  return dot > 0 ? name.slice(dot + 1).toLowerCase() : "";
}
