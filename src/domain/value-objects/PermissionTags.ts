import type { ObjectType } from '../entities/ObjectType.js';
import type { PermissionMapping } from '../entities/Credentials.js';

export const BASE_PERMISSION: Readonly<Record<ObjectType, string>> = {
  users: 'User:Read',
  roles: 'Role:Read',
  groups: 'Group:Read',
  meetings: 'User:Read',
  past_meetings: 'User:Read',
  recordings: 'Recording:Read',
  channels: 'ChatChannel:Read',
  chats: 'ChatMessage:Read',
  files: 'ChatMessage:Read',
};

export const CHAT_MESSAGE_READ = 'ChatMessage:Read';

/**
 * 基礎權限標籤加上 owner 對應的 Workplace Search 使用者。
 * owner 未設定或不在 mapping 中時只回傳基礎標籤。
 */
export function buildPermissions(
  type: ObjectType,
  ownerId: string | undefined,
  mapping: PermissionMapping,
): string[] {
  const permissions = [BASE_PERMISSION[type]];
  if (ownerId !== undefined) {
    permissions.push(...(mapping.get(ownerId) ?? []));
  }
  return permissions;
}
