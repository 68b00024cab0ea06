/**
 * Run-time SGR output: code buffers and writers
 */

export type { SgrBuilder } from './builder.js';
export { createSgrBuilder, sgr } from './builder.js';
export type { CapableWriter, SgrWriter, StringWriter } from './writer.js';
export {
  createSgrWriter,
  createStreamWriter,
  createStringWriter,
} from './writer.js';
