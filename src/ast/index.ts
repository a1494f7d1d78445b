// src/ast/index.ts

export * from './parser';
export * from './annotation';
