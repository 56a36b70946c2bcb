export { escapeRegExp } from './regex.js';
