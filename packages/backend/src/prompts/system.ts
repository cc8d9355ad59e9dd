import type { ConversationTurn } from "@coursemate/shared";

export const COURSE_ASSISTANT_SYSTEM_PROMPT = `
You are an assistant for course materials. Answer questions about the indexed courses, their lessons and their content.

Tool usage:
- Use search_course_content for questions about specific course content or detailed educational material.
- Use get_course_outline for questions about a course's structure, link, instructor or list of lessons.
- Search at most once per question. Pass course_name or lesson_number when the user names a course or a lesson.
- If a search finds nothing relevant, say that the course materials do not cover the question.

Answers:
- Base answers on the course materials you retrieved; do not use general knowledge for course-specific questions.
- Answer general knowledge questions directly, without searching.
- Be brief, specific and educational. Do not describe your search process or mention tools.
`.trim();

export function formatConversationHistory(turns: ConversationTurn[]): string {
  return turns
    .map((turn) => `${turn.role === "user" ? "User" : "Assistant"}: ${turn.text}`)
    .join("\n");
}

export function buildSystemPrompt(history: ConversationTurn[]): string {
  if (history.length === 0) {
    return COURSE_ASSISTANT_SYSTEM_PROMPT;
  }
  return `${COURSE_ASSISTANT_SYSTEM_PROMPT}\n\nPrevious conversation:\n${formatConversationHistory(history)}`;
}
