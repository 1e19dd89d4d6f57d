import { LogManager } from './logging/log-manager.js';

// Process-wide logging state. The CLI calls logManager.initialize() once at
// startup; every other module logs through `logger`.
export const logManager = new LogManager();
export const logger = logManager.logger;
