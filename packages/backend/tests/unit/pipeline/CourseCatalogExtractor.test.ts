import { describe, expect, it } from "vitest";
import {
  CourseCatalogExtractor,
  formatSourceLabel,
  lessonAt,
  titleFromFilename
} from "../../../src/pipeline/CourseCatalogExtractor.js";

const script = [
  "Course Title: Building Toward Computer Use",
  "Course Link: https://courses.example.com/computer-use",
  "Course Instructor: Test Instructor",
  "",
  "Lesson 0: Introduction",
  "Lesson Link: https://courses.example.com/computer-use/0",
  "Welcome to the course.",
  "Lesson 1: Working With The API",
  "Requests and responses."
].join("\n");

describe("CourseCatalogExtractor", () => {
  const extractor = new CourseCatalogExtractor();

  it("reads the course header and lesson list", () => {
    const { course, body, markers } = extractor.extract(script, "course1_script.txt");

    expect(course).toEqual({
      title: "Building Toward Computer Use",
      link: "https://courses.example.com/computer-use",
      instructor: "Test Instructor",
      lessons: [
        { number: 0, title: "Introduction", link: "https://courses.example.com/computer-use/0" },
        { number: 1, title: "Working With The API", link: null }
      ]
    });
    expect(body.startsWith("Lesson 0: Introduction\n")).toBe(true);
    expect(markers).toEqual([
      { number: 0, offset: 0 },
      { number: 1, offset: body.indexOf("Lesson 1:") }
    ]);
  });

  it("falls back to the filename when there is no header", () => {
    const text = "Some notes first.\nLesson 1 - Basics\nContent.";
    const { course, body, markers } = extractor.extract(text, "intro_to-rag.md");

    expect(course.title).toBe("intro to rag");
    expect(course.instructor).toBeNull();
    expect(course.link).toBeNull();
    expect(course.lessons).toEqual([{ number: 1, title: "Basics", link: null }]);
    expect(body).toBe(text);
    expect(markers).toEqual([{ number: 1, offset: 18 }]);
  });

  it("keeps first-seen order and the last title for a repeated lesson number", () => {
    const text = "Course Title: Repeats\nLesson 1: First\nLesson 2: Second\nLesson 1: Revisited";
    const { course, markers } = extractor.extract(text, "repeats.txt");

    expect(course.lessons.map((lesson) => [lesson.number, lesson.title])).toEqual([
      [1, "Revisited"],
      [2, "Second"]
    ]);
    expect(markers.map((marker) => marker.number)).toEqual([1, 2, 1]);
  });

  it("ignores prose lines that start with a lesson number", () => {
    const text = "Course Title: Loops\nLesson 5: Loops\nLesson 5 was about loops.\nLesson 6 – Functions";
    const { course, markers } = extractor.extract(text, "loops.txt");

    expect(course.lessons).toEqual([
      { number: 5, title: "Loops", link: null },
      { number: 6, title: "Functions", link: null }
    ]);
    expect(markers.map((marker) => marker.number)).toEqual([5, 6]);
  });

  it("names an untitled lesson after its number", () => {
    const { course } = extractor.extract("Course Title: Bare\nlesson 3\ntext", "bare.txt");

    expect(course.lessons).toEqual([{ number: 3, title: "Lesson 3", link: null }]);
  });

  it("returns an empty body for a header-only document", () => {
    const { course, body, markers } = extractor.extract("Course Title: Empty", "empty.txt");

    expect(course.title).toBe("Empty");
    expect(body).toBe("");
    expect(markers).toEqual([]);
  });
});

describe("lessonAt", () => {
  const markers = [
    { number: 1, offset: 10 },
    { number: 2, offset: 50 }
  ];

  it("returns null before the first marker", () => {
    expect(lessonAt(markers, 5)).toBeNull();
  });

  it("returns the section containing the offset", () => {
    expect(lessonAt(markers, 10)).toBe(1);
    expect(lessonAt(markers, 49)).toBe(1);
    expect(lessonAt(markers, 50)).toBe(2);
    expect(lessonAt(markers, 400)).toBe(2);
  });
});

describe("source labels", () => {
  it("formats course and lesson", () => {
    expect(formatSourceLabel("Intro to X", 2)).toBe("Intro to X – Lesson 2");
    expect(formatSourceLabel("Intro to X", null)).toBe("Intro to X");
  });

  it("derives a title from a filename", () => {
    expect(titleFromFilename("/tmp/course_2__script.txt")).toBe("course 2 script");
    expect(titleFromFilename("___.md")).toBe("Untitled Course");
  });
});
