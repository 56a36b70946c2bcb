export { AssociationScanner, type AssociationScannerOptions } from './association-scanner.js';
