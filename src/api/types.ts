import type { Studio } from '../runtime/studio.js';

export interface RouteOpts {
  studio: Studio;
}

export const API_VERSION = '0.1.0';
