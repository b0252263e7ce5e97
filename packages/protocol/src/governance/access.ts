/**
 * Governance: Access Registry
 *
 * Role membership as a queried capability set. One owner grants and
 * revokes; everyone else only asks `hasRole`.
 */

import { GovernanceError } from './errors.js';
import { EventEmitterPort, EventSink } from './events.js';
import { normalizeAddress, requireAccount } from './guards.js';
import { Address, componentAddress, isRole, Role, roleId } from './types.js';

export interface RoleChecker {
  hasRole(role: Role, account: Address): boolean;
}

export interface AccessRegistryOptions {
  owner: Address;
  events?: EventSink;
  address?: Address;
}

function requireRole(role: string): Role {
  if (!isRole(role)) {
    throw new GovernanceError('InvalidParameter', `unknown role: ${role}`);
  }
  return role;
}

export class AccessRegistry implements RoleChecker {
  readonly address: Address;
  private readonly events: EventEmitterPort;
  private readonly members = new Map<Role, Set<Address>>();
  private currentOwner: Address;

  constructor(options: AccessRegistryOptions) {
    this.address = options.address ?? componentAddress('vaultgov.access');
    this.events = new EventEmitterPort(this.address, options.events);
    this.currentOwner = requireAccount(options.owner, 'owner');
  }

  owner(): Address {
    return this.currentOwner;
  }

  /** Returns false when the account already held the role. */
  grantRole(caller: Address, role: Role, account: Address): boolean {
    const sender = this.requireOwner(caller);
    const target = requireRole(role);
    const member = requireAccount(account, 'account');
    const set = this.members.get(target) ?? new Set<Address>();
    if (set.has(member)) {
      return false;
    }
    set.add(member);
    this.members.set(target, set);
    this.events.emit('role.granted', { role: target, roleId: roleId(target), account: member, sender });
    return true;
  }

  /** Returns false when the account did not hold the role. */
  revokeRole(caller: Address, role: Role, account: Address): boolean {
    const sender = this.requireOwner(caller);
    const target = requireRole(role);
    const member = requireAccount(account, 'account');
    const set = this.members.get(target);
    if (!set || !set.delete(member)) {
      return false;
    }
    this.events.emit('role.revoked', { role: target, roleId: roleId(target), account: member, sender });
    return true;
  }

  hasRole(role: Role, account: Address): boolean {
    return this.members.get(role)?.has(normalizeAddress(account, 'account')) ?? false;
  }

  membersOf(role: Role): Address[] {
    return [...(this.members.get(requireRole(role)) ?? [])];
  }

  transferOwnership(caller: Address, newOwner: Address): void {
    const previous = this.requireOwner(caller);
    const next = requireAccount(newOwner, 'newOwner');
    this.currentOwner = next;
    this.events.emit('ownership.transferred', {
      component: 'access',
      previousOwner: previous,
      newOwner: next,
    });
  }

  private requireOwner(caller: Address): Address {
    const sender = requireAccount(caller, 'caller');
    if (sender !== this.currentOwner) {
      throw new GovernanceError('Unauthorized', 'Caller is not the access registry owner');
    }
    return sender;
  }
}
