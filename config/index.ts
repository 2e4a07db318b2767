export { etlConfig, validateETLConfig } from './etl.config.js';
export type { ETLConfig, NivelLog } from './etl.config.js';
