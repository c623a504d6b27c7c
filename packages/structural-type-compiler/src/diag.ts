import ts from "typescript";

export type FrameOptions = {
  /** Lines shown above and below the span. */
  context?: number;
  /** Printed after the carets. */
  label?: string;
};

/**
 * Source lines around `[start, start + length)`. Carets mark the span on its
 * first line; a span that continues below is marked to the end of that line.
 */
export function formatCodeFrame(
  file: ts.SourceFile,
  start: number,
  length: number,
  { context = 2, label }: FrameOptions = {},
): string {
  const lines = file.text.split(/\r?\n/);
  const head = file.getLineAndCharacterOfPosition(start);
  const tail = file.getLineAndCharacterOfPosition(start + Math.max(0, length - 1));
  const first = Math.max(0, head.line - context);
  const last = Math.min(lines.length - 1, tail.line + context);
  const width = String(last + 1).length;

  const frame: string[] = [];
  lines.slice(first, last + 1).forEach((text, i) => {
    const line = first + i;
    frame.push(`${String(line + 1).padStart(width)} | ${text}`);
    if (line !== head.line) return;
    const end = tail.line === head.line ? tail.character + 1 : text.length;
    const carets = "^".repeat(Math.max(1, end - head.character));
    const marker = `${" ".repeat(head.character)}${carets}`;
    frame.push(`${" ".repeat(width)} | ${label ? `${marker} ${label}` : marker}`);
  });
  return frame.join("\n") + "\n";
}

/**
 * An error diagnostic on `node`; the message is followed by a code frame
 * whose carets carry `label`.
 */
export function diagnostic(
  node: ts.Node,
  message: string,
  code: number,
  label?: string,
): ts.Diagnostic {
  const file = node.getSourceFile();
  const start = node.getStart(file);
  const length = node.getWidth(file);
  return {
    category: ts.DiagnosticCategory.Error,
    code,
    file,
    start,
    length,
    messageText: `${message}\n${formatCodeFrame(file, start, length, { label })}`,
  };
}

/**
 * One line per diagnostic: `<kind>Error: <message> (<file>:<line>:<col>)`.
 */
export function formatDiagnostic(kind: string, d: ts.Diagnostic): string {
  const message = ts.flattenDiagnosticMessageText(d.messageText, "\n");
  const { file, start } = d;
  if (!file || typeof start !== "number") return `${kind}Error: ${message}`;
  const pos = file.getLineAndCharacterOfPosition(start);
  return `${kind}Error: ${message} (${file.fileName}:${pos.line + 1}:${
    pos.character + 1
  })`;
}

export function printDiagnostics(
  kind: string,
  diags: readonly ts.Diagnostic[],
): number {
  for (const d of diags) {
    console.error(formatDiagnostic(kind, d));
  }
  return diags.length > 0 ? 1 : 0;
}
