import type { AppConfig } from './types/index.js';
import { loadConfig } from './config.js';

export interface ServerContainer {
    config: AppConfig;
}

export function createContainer(config: AppConfig = loadConfig()): ServerContainer {
    return { config };
}
