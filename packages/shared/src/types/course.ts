export interface Lesson {
  number: number;
  title: string;
  link: string | null;
}

export interface CourseMetadata {
  title: string;
  instructor: string | null;
  link: string | null;
  lessons: Lesson[];
}

export interface CourseChunk {
  id: string;
  text: string;
  index: number;
  courseTitle: string;
  lessonNumber: number | null;
  sourceLabel: string;
}

/** A chunk before indexing; the index assigns the stored id. */
export type CourseChunkDraft = Omit<CourseChunk, "id">;

export interface SearchFilter {
  courseTitle: string | null;
  lessonNumber: number | null;
}

export interface SearchHit {
  chunk: CourseChunk;
  score: number;
  distance: number;
}

export type SearchResult = SearchHit[];

export interface CourseSummary {
  title: string;
  instructor: string | null;
  lessonCount: number;
  chunkCount: number;
  ingestedAt: Date;
}
