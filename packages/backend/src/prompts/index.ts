export { COURSE_ASSISTANT_SYSTEM_PROMPT, buildSystemPrompt, formatConversationHistory } from "./system.js";
