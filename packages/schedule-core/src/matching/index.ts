export { createMatcher, match, matchAll } from './matcher.js';
