import { config } from './config';
import { EarningsService } from './earningsService';
import { ScripStore } from './scripStore';
import { createSourceRegistry } from './sources';

// Built once per server process and shared by every route handler.
export const sourceRegistry = createSourceRegistry();
export const earningsService = new EarningsService(sourceRegistry);
export const scripStore = new ScripStore(config.scripPath);
