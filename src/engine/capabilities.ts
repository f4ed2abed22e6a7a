import type { UserRole } from '../models/types.js';

export type Capability = 'manage_opportunity' | 'review_applications' | 'confirm_redemption';

// Explicit allow/deny on (capability, role, actor, owner); no role hierarchy.
// Ownership is by id alone: the creating promoter keeps control of an
// opportunity whatever role they hold later.
export function can(capability: Capability, role: UserRole, actorId: string, ownerId?: string): boolean {
  if (role === 'ADMIN') return true;
  switch (capability) {
    case 'manage_opportunity':
    case 'review_applications':
      return ownerId !== undefined && actorId === ownerId;
    case 'confirm_redemption':
      return role === 'PARTNER' && ownerId !== undefined && actorId === ownerId;
  }
}
