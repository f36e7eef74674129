export { BufferSink, FileDescriptorSink, type KeyInfoSink } from './sinks.js';
export { createTempFile, openForWrite, removeFile, useFile, type TempFile } from './tempFile.js';
