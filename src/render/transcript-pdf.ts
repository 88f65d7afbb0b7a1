/**
 * Transcript → PDF rendering with pdf-lib.
 *
 * Letter pages with one-inch margins: a centred title block (company,
 * event, date) followed by one paragraph per non-blank line of text.
 */
import { PDFDocument, StandardFonts, rgb, type PDFFont, type PDFPage } from "pdf-lib";

export interface TranscriptDocument {
  companyName: string;
  eventTitle: string;
  eventDate: string;
  text: string;
}

export type TranscriptRenderer = (doc: TranscriptDocument) => Promise<Uint8Array>;

const PAGE_WIDTH = 612;
const PAGE_HEIGHT = 792;
const MARGIN = 72;
const CONTENT_WIDTH = PAGE_WIDTH - 2 * MARGIN;

const HEADER_SIZE = 14;
const HEADER_LEADING = 18;
const HEADER_SPACE_AFTER = 60;
const HEADER_COLOR = rgb(0x1a / 255, 0x47 / 255, 0x2a / 255);

const TEXT_SIZE = 10;
const TEXT_LEADING = 14;
const PARAGRAPH_SPACE = 12;

/** Replace characters the standard font cannot encode. */
function sanitizer(font: PDFFont): (text: string) => string {
  const supported = new Set(font.getCharacterSet());
  return (text) =>
    Array.from(text.replace(/\s/g, " "))
      .map((ch) => {
        const code = ch.codePointAt(0);
        return code !== undefined && supported.has(code) ? ch : "?";
      })
      .join("");
}

/** Greedy word wrap; words wider than the line are split by character. */
export function wrapText(
  text: string,
  width: number,
  measure: (s: string) => number,
): string[] {
  const lines: string[] = [];
  let line = "";

  const pushWord = (word: string) => {
    let rest = word;
    while (measure(rest) > width && rest.length > 1) {
      let cut = rest.length - 1;
      while (cut > 1 && measure(rest.slice(0, cut)) > width) cut--;
      lines.push(rest.slice(0, cut));
      rest = rest.slice(cut);
    }
    line = rest;
  };

  for (const word of text.split(" ").filter(Boolean)) {
    if (!line) {
      pushWord(word);
      continue;
    }
    const candidate = `${line} ${word}`;
    if (measure(candidate) <= width) {
      line = candidate;
    } else {
      lines.push(line);
      pushWord(word);
    }
  }
  if (line) lines.push(line);
  return lines;
}

class PageCursor {
  private doc: PDFDocument;
  private page: PDFPage;
  private y: number;

  constructor(doc: PDFDocument) {
    this.doc = doc;
    this.page = doc.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
    this.y = PAGE_HEIGHT - MARGIN;
  }

  /** Move down by `height`, starting a new page when the margin is reached. */
  advance(height: number): PDFPage {
    if (this.y - height < MARGIN) {
      this.page = this.doc.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
      this.y = PAGE_HEIGHT - MARGIN;
    }
    this.y -= height;
    return this.page;
  }

  get baseline(): number {
    return this.y;
  }

  skip(height: number): void {
    this.y = Math.max(this.y - height, MARGIN);
  }
}

export const renderTranscriptPdf: TranscriptRenderer = async (input) => {
  const doc = await PDFDocument.create();
  doc.setTitle(`${input.companyName} - ${input.eventTitle}`);

  const regular = await doc.embedFont(StandardFonts.Helvetica);
  const bold = await doc.embedFont(StandardFonts.HelveticaBold);
  const cleanRegular = sanitizer(regular);
  const cleanBold = sanitizer(bold);

  const cursor = new PageCursor(doc);

  const header: Array<{ text: string; font: PDFFont }> = [
    { text: cleanBold(input.companyName), font: bold },
    { text: "", font: regular },
    { text: cleanRegular(`Event: ${input.eventTitle}`), font: regular },
    { text: cleanRegular(`Date: ${input.eventDate}`), font: regular },
  ];
  for (const { text, font } of header) {
    const measure = (s: string) => font.widthOfTextAtSize(s, HEADER_SIZE);
    const lines = text ? wrapText(text, CONTENT_WIDTH, measure) : [""];
    for (const line of lines) {
      const page = cursor.advance(HEADER_LEADING);
      if (!line) continue;
      page.drawText(line, {
        x: MARGIN + (CONTENT_WIDTH - measure(line)) / 2,
        y: cursor.baseline,
        size: HEADER_SIZE,
        font,
        color: HEADER_COLOR,
      });
    }
  }
  cursor.skip(HEADER_SPACE_AFTER);

  const measure = (s: string) => regular.widthOfTextAtSize(s, TEXT_SIZE);
  for (const paragraph of input.text.split("\n")) {
    if (!paragraph.trim()) continue;
    for (const line of wrapText(cleanRegular(paragraph), CONTENT_WIDTH, measure)) {
      const page = cursor.advance(TEXT_LEADING);
      page.drawText(line, {
        x: MARGIN,
        y: cursor.baseline,
        size: TEXT_SIZE,
        font: regular,
      });
    }
    cursor.skip(PARAGRAPH_SPACE);
  }

  return doc.save();
};
