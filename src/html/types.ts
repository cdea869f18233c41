/// # shared types
///
/// configuration for the two html pages linetally can produce: the
/// report (tables per chart) and the annotated view of a single file.

import type { LineKind } from "../classify.js";

export interface HtmlOptions {
  /// path to an external CSS file. if omitted, styles are inlined
  /// directly into the `<style>` tag of the page.
  cssFile?: string;
  /// title for the html page. defaults to the filename for annotated
  /// views and to "linetally report" for reports.
  title?: string;
}

/// one physical line as the annotated view sees it: the classifier's
/// verdict plus the categories whose ranges contain it.
export interface AnnotatedLine {
  number: number;
  kind: LineKind;
  categories: string[];
  /// pre-rendered, syntax-highlighted html for the line's text.
  html: string;
}
