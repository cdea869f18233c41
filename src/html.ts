/// # html generation (re-export)
///
/// the implementation lives in `./html/index.ts`; this barrel keeps the
/// folder structure out of consumers' import paths.

export {
  generateReportHtml,
  generateAnnotatedHtml,
  type AnnotatedLine,
  type HtmlOptions
} from "./html/index.js";
