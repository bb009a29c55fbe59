/**
 * Test Support Utilities
 */

export { createTempFiles, type TempFiles } from './temp-files.js'
