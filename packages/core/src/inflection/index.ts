export { singularize, pluralize, classNameToTableName, singularToClassName } from './inflector.js';
