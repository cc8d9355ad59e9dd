import { basename, extname } from "node:path";
import type { CourseMetadata, Lesson } from "@coursemate/shared";

export interface LessonMarker {
  number: number;
  offset: number;
}

export interface CatalogExtraction {
  course: CourseMetadata;
  /** Document text after the header block; marker offsets are relative to it. */
  body: string;
  markers: LessonMarker[];
}

interface Line {
  text: string;
  offset: number;
}

const headerPatterns = {
  title: /^course\s+title\s*:\s*(.*)$/i,
  link: /^course\s+link\s*:\s*(.*)$/i,
  instructor: /^course\s+instructor\s*:\s*(.*)$/i
};
// "Lesson N" alone, or followed by ":", "." or a dash and the title
const lessonPattern = /^[ \t]*lesson[ \t]+(\d+)[ \t]*(?:[:.\-–—][ \t]*(.*))?$/i;
const lessonLinkPattern = /^[ \t]*lesson\s+link\s*:\s*(\S.*)$/i;

export class CourseCatalogExtractor {
  extract(documentText: string, filenameHint: string): CatalogExtraction {
    const lines = splitLines(documentText);
    const header = readHeader(lines);
    const bodyStart = header.found ? header.bodyOffset : 0;
    const body = documentText.slice(bodyStart);

    const lessons = new Map<number, Lesson>();
    const markers: LessonMarker[] = [];
    const bodyLines = splitLines(body);

    bodyLines.forEach((line, position) => {
      const match = lessonPattern.exec(line.text);
      if (!match?.[1]) {
        return;
      }

      const number = Number.parseInt(match[1], 10);
      const title = (match[2] ?? "").trim();
      const nextLine = bodyLines[position + 1];
      const linkMatch = nextLine ? lessonLinkPattern.exec(nextLine.text) : null;

      markers.push({ number, offset: line.offset });
      lessons.set(number, {
        number,
        title: title.length > 0 ? title : `Lesson ${number}`,
        link: linkMatch?.[1]?.trim() ?? null
      });
    });

    return {
      course: {
        title: header.title ?? titleFromFilename(filenameHint),
        instructor: header.instructor,
        link: header.link,
        lessons: [...lessons.values()]
      },
      body,
      markers
    };
  }
}

/** Number of the last lesson marker at or before `offset`, or null before the first. */
export function lessonAt(markers: LessonMarker[], offset: number): number | null {
  let lesson: number | null = null;
  for (const marker of markers) {
    if (marker.offset > offset) {
      break;
    }
    lesson = marker.number;
  }
  return lesson;
}

export function formatSourceLabel(courseTitle: string, lessonNumber: number | null): string {
  return lessonNumber === null ? courseTitle : `${courseTitle} – Lesson ${lessonNumber}`;
}

export function titleFromFilename(filename: string): string {
  const base = basename(filename, extname(filename))
    .replace(/[_-]+/g, " ")
    .replace(/\s+/g, " ")
    .trim();
  return base.length > 0 ? base : "Untitled Course";
}

interface CourseHeader {
  found: boolean;
  bodyOffset: number;
  title: string | null;
  instructor: string | null;
  link: string | null;
}

function readHeader(lines: Line[]): CourseHeader {
  const header: CourseHeader = {
    found: false,
    bodyOffset: 0,
    title: null,
    instructor: null,
    link: null
  };

  for (const line of lines) {
    const text = line.text.trim();
    header.bodyOffset = line.offset;
    if (text.length === 0) {
      continue;
    }

    const title = headerPatterns.title.exec(text)?.[1];
    const link = headerPatterns.link.exec(text)?.[1];
    const instructor = headerPatterns.instructor.exec(text)?.[1];
    if (title === undefined && link === undefined && instructor === undefined) {
      return header;
    }

    header.found = true;
    if (title !== undefined) {
      header.title = nonEmpty(title);
    }
    if (link !== undefined) {
      header.link = nonEmpty(link);
    }
    if (instructor !== undefined) {
      header.instructor = nonEmpty(instructor);
    }
  }

  // header only, no body
  const last = lines[lines.length - 1];
  header.bodyOffset = last ? last.offset + last.text.length : 0;
  return header;
}

function splitLines(text: string): Line[] {
  const lines: Line[] = [];
  let offset = 0;
  for (const raw of text.split("\n")) {
    lines.push({ text: raw.endsWith("\r") ? raw.slice(0, -1) : raw, offset });
    offset += raw.length + 1;
  }
  return lines;
}

function nonEmpty(value: string): string | null {
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}
