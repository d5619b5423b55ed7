import type { ChatRole } from './types.js';

export interface PermissionResult {
  allowed: boolean;
  reason?: string;
}

const MODERATOR_COMMANDS = new Set([
  '!sul',
  '!translateblock',
  '!translateunblock',
  '!blockword',
  '!unblockword'
]);

export class PermissionService {
  isModerator(role: ChatRole): boolean {
    return role === 'moderator' || role === 'broadcaster';
  }

  requiresModerator(command: string): boolean {
    return MODERATOR_COMMANDS.has(command.toLowerCase());
  }

  canUseCommand(role: ChatRole, command: string): PermissionResult {
    if (!this.requiresModerator(command) || this.isModerator(role)) {
      return { allowed: true };
    }

    return {
      allowed: false,
      reason: `${command} is restricted to moderators`
    };
  }
}

export const permissions = new PermissionService();
