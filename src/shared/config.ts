import { loadConfig } from './env';

export type { Config } from './env';

export const config = loadConfig();
