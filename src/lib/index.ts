export * from './anchor';
export * from './baseline';
export * from './checker';
export * from './config';
export * from './dedupe';
export * from './delimiters';
export * from './diagnostics';
export * from './fileSystem';
export * from './ledger';
export * from './memoryFileSystem';
export * from './models';
export * from './patch';
export * from './repair';
export * from './report';
export * from './scanner';
export * from './utils';
