/**
 * Wikipedia REST API Response Types
 * @see https://en.wikipedia.org/api/rest_v1/#/Page%20content/get_page_summary__title_
 */

export interface WikipediaPageSummary {
  type?: string;
  title?: string;
  displaytitle?: string;
  extract?: string;
  extract_html?: string;
}
