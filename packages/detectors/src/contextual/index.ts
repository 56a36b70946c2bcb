export { ContextualScanner } from './contextual-scanner.js';
