export type { ILogger } from './ILogger';
