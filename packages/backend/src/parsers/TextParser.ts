import { countWords, type DocumentParser, type ParsedDocumentResult } from "./types.js";

const byteOrderMark = "\uFEFF";

/** Decodes UTF-8 course text (.txt and .md) and normalizes line endings to `\n`. */
export class TextParser implements DocumentParser {
  async parse(buffer: Buffer): Promise<ParsedDocumentResult> {
    const decoded = buffer.toString("utf8");
    const text = (decoded.startsWith(byteOrderMark) ? decoded.slice(1) : decoded).replace(
      /\r\n?/g,
      "\n"
    );

    return {
      text,
      metadata: {
        wordCount: countWords(text),
        lineCount: text.length > 0 ? text.split("\n").length : 0
      }
    };
  }
}
