import type { LogLevel } from '../logging/logger.js';

export interface NavigatorConfig {
  logging: {
    level: LogLevel;
  };
  build: {
    /** Upper bound on nodes per built tree; unbounded when omitted. */
    maxNodes?: number;
  };
}

export interface PartialNavigatorConfig {
  logging?: Partial<NavigatorConfig['logging']>;
  build?: Partial<NavigatorConfig['build']>;
}

export const DEFAULT_CONFIG: NavigatorConfig = {
  logging: { level: 'info' },
  build: {},
};
