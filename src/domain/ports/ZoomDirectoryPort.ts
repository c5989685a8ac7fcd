import type { JsonObject } from './ZoomApiPort.js';

export interface ZoomRole {
  id: string;
  raw: JsonObject;
}

/** 多個 fetcher 與 permission sync 共用的目錄查詢 */
export interface ZoomDirectoryPort {
  listUsers(): Promise<JsonObject[]>;
  listRoles(): Promise<ZoomRole[]>;
  listRolePrivileges(roleId: string): Promise<string[]>;
  listRoleMembers(roleId: string): Promise<string[]>;
  listMeetings(userId: string): Promise<JsonObject[]>;
  /** 擁有 ChatMessage:Read 角色的成員 id（可能重複） */
  listChatEnabledUserIds(): Promise<string[]>;
}
