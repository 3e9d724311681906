// Centralized external dependencies
// All npm imports go here to avoid scattered external imports

// HTML parsing
export { parse as parseHtml } from 'html5parser';
export type { INode, ITag } from 'html5parser';

// .env files
export { config as dotenvConfig } from 'dotenv';
