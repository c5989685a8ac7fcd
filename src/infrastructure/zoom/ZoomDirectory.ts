import type { JsonObject, ZoomApiPort } from '../../domain/ports/ZoomApiPort.js';
import type { ZoomDirectoryPort, ZoomRole } from '../../domain/ports/ZoomDirectoryPort.js';
import { CHAT_MESSAGE_READ } from '../../domain/value-objects/PermissionTags.js';
import { Logger } from '../../shared/Logger.js';
import { readRecords, readString, readStrings } from '../../shared/json.js';

export class ZoomDirectory implements ZoomDirectoryPort {
  private readonly logger = new Logger('ZoomDirectory');

  constructor(private readonly api: ZoomApiPort) {}

  async listUsers(): Promise<JsonObject[]> {
    const users = await this.api.getPaginated('users?page_size=300', 'users');
    this.logger.info('Fetched users', { count: users.length });
    return users;
  }

  async listRoles(): Promise<ZoomRole[]> {
    const response = await this.api.get('roles');
    return readRecords(response, 'roles').map((raw) => ({ id: readString(raw, 'id'), raw }));
  }

  async listRolePrivileges(roleId: string): Promise<string[]> {
    const response = await this.api.get(`roles/${encodeURIComponent(roleId)}`);
    const privileges = readStrings(response, 'privileges');
    this.logger.debug('Fetched role privileges', { roleId, count: privileges.length });
    return privileges;
  }

  async listRoleMembers(roleId: string): Promise<string[]> {
    const members = await this.api.getPaginated(
      `roles/${encodeURIComponent(roleId)}/members?page_size=300`,
      'members',
    );
    this.logger.debug('Fetched role members', { roleId, count: members.length });
    return members.map((member) => readString(member, 'id'));
  }

  listMeetings(userId: string): Promise<JsonObject[]> {
    return this.api.getPaginated(`users/${encodeURIComponent(userId)}/meetings?page_size=300`, 'meetings');
  }

  async listChatEnabledUserIds(): Promise<string[]> {
    const userIds: string[] = [];
    for (const role of await this.listRoles()) {
      const privileges = await this.listRolePrivileges(role.id);
      if (!privileges.includes(CHAT_MESSAGE_READ)) continue;
      userIds.push(...(await this.listRoleMembers(role.id)));
    }
    return userIds;
  }
}
