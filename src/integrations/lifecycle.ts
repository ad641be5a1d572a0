/**
 * Integration lifecycle state machine.
 *
 *   absent   --connect-->    active
 *   active   --update-->     active
 *   active   --disconnect--> inactive
 *   inactive --reconnect-->  active
 *
 * A row is never deleted, so there is no transition back to absent.
 * Connect is rejected whenever a row exists; a retired integration comes
 * back only through reconnect.
 */

import { ConflictError, NotFoundError } from './errors.js';
import type { Integration } from './types.js';

export type IntegrationState = 'absent' | 'active' | 'inactive';
export type LifecycleAction = 'connect' | 'update' | 'reconnect' | 'disconnect';

const TRANSITIONS: Record<LifecycleAction, Partial<Record<IntegrationState, IntegrationState>>> = {
  connect: { absent: 'active' },
  update: { active: 'active' },
  reconnect: { inactive: 'active', active: 'active' },
  disconnect: { active: 'inactive' },
};

export function stateOf(integration: Integration | null): IntegrationState {
  if (!integration) return 'absent';
  return integration.isActive ? 'active' : 'inactive';
}

/** Resolve the next state, or throw the error the caller should surface. */
export function transition(state: IntegrationState, action: LifecycleAction, crmType: string): IntegrationState {
  const next = TRANSITIONS[action][state];
  if (next) return next;

  if (action === 'connect') {
    throw new ConflictError(
      state === 'active'
        ? `${crmType} is already connected`
        : `${crmType} was previously disconnected; reconnect it with an update and reconnect: true`,
    );
  }
  if (state === 'inactive') {
    throw new NotFoundError(
      action === 'update'
        ? `${crmType} integration is disconnected; pass reconnect: true to restore it`
        : `No active ${crmType} integration found`,
    );
  }
  throw new NotFoundError(`No ${crmType} integration found`);
}
