/**
 * @hostloop/client
 *
 * Host-facing facade: OAuth sign-in, token upkeep and document RPC driven
 * from a non-blocking host loop
 */

export {
  HostLoopClient,
  type HostLoopClientOptions,
  type EnvironmentClientOptions,
  type ClientStatus,
  type ProviderStatus,
} from './host-loop-client.js';
export type { BridgeEvent } from './events.js';
