/**
 * Console Output
 *
 * Word-wrapped writes for the interactive commands. Wrapping only applies
 * when the stream reports a width; otherwise text goes out unchanged.
 */

// ============================================================================
// Types
// ============================================================================

/** The parts of a writable stream the writer needs. process.stdout fits. */
export interface OutputStream {
  write(chunk: string): unknown;
  columns?: number;
  isTTY?: boolean;
}

export interface TextOutput {
  write(text: string): void;
  writeLine(text?: string): void;
  clear(): void;
}

// ============================================================================
// Wrapping
// ============================================================================

/**
 * Break text on spaces so no line reaches `width` characters. Words longer
 * than the width get a line of their own; existing line breaks are kept.
 */
export function wordWrap(text: string, width: number): string {
  if (text.trim() === "" || width <= 0) return text;

  return text
    .split("\n")
    .map((line) => wrapLine(line, width))
    .join("\n");
}

function wrapLine(line: string, width: number): string {
  let result = "";
  let lineLength = 0;

  for (const word of line.split(" ")) {
    if (lineLength > 0 && lineLength + word.length >= width) {
      result += "\n";
      lineLength = 0;
    }
    if (lineLength > 0) {
      result += " ";
      lineLength += 1;
    }
    result += word;
    lineLength += word.length;
  }

  return result;
}

// ============================================================================
// Writer
// ============================================================================

export class ConsoleWriter implements TextOutput {
  constructor(private readonly stream: OutputStream = process.stdout) {}

  write(text: string): void {
    this.stream.write(this.format(text));
  }

  writeLine(text = ""): void {
    this.stream.write(`${this.format(text)}\n`);
  }

  /** Reset the terminal; on anything else just leave a blank line. */
  clear(): void {
    this.stream.write(this.stream.isTTY ? "\x1Bc" : "\n");
  }

  private format(text: string): string {
    const width = this.stream.columns;
    return width !== undefined && width > 0 ? wordWrap(text, width) : text;
  }
}
