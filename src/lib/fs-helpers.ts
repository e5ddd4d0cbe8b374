export { readTextFile } from './fs-helpers/readers/read-text-file.js';
