/** Literal token replaced by the page number */
export const PAGE_PLACEHOLDER = '{page}';

// Existing page query parameter: keeps its ? or & separator
const PAGE_PARAM_REGEX = /([?&])page=(\d+)/;

/**
 * Build the URL of one page from a template.
 *
 * 1. `{page}` tokens are substituted.
 * 2. Otherwise an existing `page=<n>` query value is replaced (first occurrence).
 * 3. Otherwise `page=<n>` is appended as a new query parameter.
 */
export function buildPageUrl(template: string, page: number): string {
  const pageValue = String(page);

  if (template.includes(PAGE_PLACEHOLDER)) {
    return template.split(PAGE_PLACEHOLDER).join(pageValue);
  }

  if (PAGE_PARAM_REGEX.test(template)) {
    return template.replace(PAGE_PARAM_REGEX, (_match, separator: string) => `${separator}page=${pageValue}`);
  }

  return `${template}${template.includes('?') ? '&' : '?'}page=${pageValue}`;
}

/**
 * Inclusive page range, e.g. pageRange(2, 4) -> [2, 3, 4]
 */
export function pageRange(startPage: number, endPage: number): number[] {
  if (endPage < startPage) return [];
  return Array.from({ length: endPage - startPage + 1 }, (_, i) => startPage + i);
}
