export { buildTempUrl, type TempUrlMethod } from './tempurl.js';
