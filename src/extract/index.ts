export {
  ContentExtractor,
  htmlToText,
  type ContentSource,
  type ExtractedContent,
  type ExtractionStatus,
} from "./extractor.js";
