/**
 * Routes redirects on the shared port to the machine whose flow they
 * belong to, by state nonce
 */

import { logger } from '@hostloop/observability';
import type { ProviderId } from '@hostloop/persistence';
import type { AuthStateMachine } from './auth-state-machine.js';
import {
  ProviderDeniedError,
  StateMismatchError,
  type AuthError,
  type RedirectParams,
} from './providers/types.js';

export type RedirectOutcome =
  | { readonly kind: 'accepted'; readonly provider: ProviderId }
  | { readonly kind: 'denied'; readonly provider: ProviderId; readonly error: ProviderDeniedError }
  | { readonly kind: 'rejected'; readonly error: AuthError }
  | { readonly kind: 'noPending' };

export class RedirectDispatcher {
  private readonly machines = new Map<ProviderId, AuthStateMachine>();

  constructor(machines: Iterable<AuthStateMachine> = []) {
    for (const machine of machines) {
      this.register(machine);
    }
  }

  register(machine: AuthStateMachine): void {
    this.machines.set(machine.providerId, machine);
  }

  dispatch(params: RedirectParams): RedirectOutcome {
    const machines = Array.from(this.machines.values());

    const owner = machines.find((machine) => machine.matchState(params.state) === 'current');
    if (owner) {
      return this.deliver(owner, params);
    }

    // Superseded and timed-out nonces are recognised by the machine that issued them
    const previousOwner = machines.find((machine) => machine.matchState(params.state) === 'retired');
    if (previousOwner) {
      return this.deliver(previousOwner, params);
    }

    const pending = machines.filter((machine) => machine.hasPendingFlow());
    if (pending.length === 0) {
      logger.oauthDebug('Redirect received with no pending authentication');
      return { kind: 'noPending' };
    }

    // A single pending flow can report the mismatch under its own provider
    if (pending.length === 1) {
      return this.deliver(pending[0], params);
    }

    logger.oauthWarn('Redirect state matches none of the pending flows', { pending: pending.length });
    return { kind: 'rejected', error: new StateMismatchError() };
  }

  private deliver(machine: AuthStateMachine, params: RedirectParams): RedirectOutcome {
    const result = machine.handleRedirect(params);
    if (result.ok) {
      return { kind: 'accepted', provider: machine.providerId };
    }
    if (result.error instanceof ProviderDeniedError) {
      return { kind: 'denied', provider: machine.providerId, error: result.error };
    }
    return { kind: 'rejected', error: result.error };
  }
}
