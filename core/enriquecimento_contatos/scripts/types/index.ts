export * from './contatos.types.js';
export * from './etl.types.js';
