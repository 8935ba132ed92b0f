/**
 * Fax backend factory - returns the configured backend
 */

import type { GatewayConfig } from '../config';
import { HylafaxBackend } from '../hylafax/backend';
import { SimulatedBackend } from './simulated';
import type { FaxBackend } from './types';

export function getFaxBackend(config: GatewayConfig): FaxBackend {
  switch (config.backend) {
    case 'simulated':
      console.log('[Fax] Using simulated backend');
      return new SimulatedBackend();
    case 'hylafax':
      console.log(`[Fax] Using HylaFAX backend at ${config.hylafax.host}:${config.hylafax.port}`);
      return new HylafaxBackend({
        port: config.hylafax.port,
        connectTimeoutMs: config.hylafax.connectTimeoutMs,
        username: config.hylafax.username,
        password: config.hylafax.password,
        useGmt: config.hylafax.useGmt,
      });
    default: {
      const unreachable: never = config.backend;
      throw new Error(`Unknown fax backend: ${String(unreachable)}`);
    }
  }
}
