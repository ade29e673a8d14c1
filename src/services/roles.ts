import { NotFoundError } from '../lib/errors.js';
import type { UserRepository } from '../repositories/types.js';
import type { GroupRole, Principal, Role, UserRecord } from '../types/domain.js';

type HasRoles = Pick<Principal, 'roles'>;

export function isManager(who: HasRoles): boolean {
  return who.roles.has('manager');
}

export function isDeliveryCrew(who: HasRoles): boolean {
  return who.roles.has('delivery-crew');
}

/** Staff privilege: explicitly granted, or implied by being a manager. */
export function isStaff(who: HasRoles): boolean {
  return who.roles.has('staff') || isManager(who);
}

export function toPrincipal(user: UserRecord, uid: string): Principal {
  const roles = new Set<Role>(user.roles);
  roles.add('customer');
  return { id: user.id, uid, username: user.username, roles };
}

export const GROUP_LABELS: Record<GroupRole, string> = {
  manager: 'Manager',
  'delivery-crew': 'Delivery Crew',
};

/**
 * Role assignment. Group membership is stored as a role on the user; nothing
 * else about the user changes when a role is granted or revoked.
 */
export class RoleService {
  constructor(private readonly users: UserRepository) {}

  members(role: GroupRole): Promise<UserRecord[]> {
    return this.users.findByRole(role);
  }

  async hasRole(userId: number, role: Role): Promise<boolean> {
    const user = await this.users.findById(userId);
    return user !== null && user.roles.includes(role);
  }

  async grant(username: string, role: GroupRole): Promise<UserRecord> {
    const user = await this.users.findByUsername(username);
    if (!user) throw new NotFoundError(`User '${username}' not found`);
    const updated = await this.users.addRole(user.id, role);
    if (!updated) throw new NotFoundError(`User '${username}' not found`);
    return updated;
  }

  async revoke(userId: number, role: GroupRole): Promise<UserRecord> {
    const user = await this.users.findById(userId);
    if (!user) throw new NotFoundError(`User with id '${userId}' not found`);
    if (!user.roles.includes(role)) {
      throw new NotFoundError(`User is not in the ${GROUP_LABELS[role]} group`);
    }
    const updated = await this.users.removeRole(userId, role);
    if (!updated) throw new NotFoundError(`User with id '${userId}' not found`);
    return updated;
  }
}
