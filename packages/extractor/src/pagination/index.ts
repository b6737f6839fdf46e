export { buildPageUrl, pageRange, PAGE_PLACEHOLDER } from './url-template';
