export * from './assembler.js';
export * from './classify.js';
export * from './layout.js';
export * from './normalize.js';
export * from './sections.js';
export * from './style.js';
