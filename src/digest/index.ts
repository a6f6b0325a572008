export {
  formatDate,
  hnItemUrl,
  isDegraded,
  storyUrl,
  summaryOrPlaceholder,
  unavailableReason,
  type DigestEntry,
} from "./entry.js";
export { digestTitle, escapeHtml, renderHtml, renderText } from "./render.js";
