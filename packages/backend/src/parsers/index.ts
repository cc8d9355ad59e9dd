export { TextParser } from "./TextParser.js";
export {
  isSupportedCourseFile,
  sanitizeFilename,
  validateUploadedFile,
  type SupportedFileType,
  type UploadedFileLike,
  type ValidatedFile
} from "./fileValidator.js";
export { countWords, type DocumentParser, type ParsedDocumentResult } from "./types.js";
