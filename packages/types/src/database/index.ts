export type { IDatabaseService } from './IDatabaseService.js';
