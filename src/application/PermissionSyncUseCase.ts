import type { PermissionMapping } from '../domain/entities/Credentials.js';
import { EmptyMappingError, PermissionSyncDisabledError } from '../domain/errors/DomainErrors.js';
import type { SearchIndexPort } from '../domain/ports/SearchIndexPort.js';
import type { ZoomDirectoryPort } from '../domain/ports/ZoomDirectoryPort.js';
import { BASE_PERMISSION } from '../domain/value-objects/PermissionTags.js';
import { Logger } from '../shared/Logger.js';
import type { PermissionStats } from './dto/SyncStats.js';

export interface PermissionSyncOptions {
  enabled: boolean;
  mappingPath?: string;
}

const READ_PRIVILEGES: ReadonlySet<string> = new Set(Object.values(BASE_PERMISSION));

/**
 * 以 Zoom 角色權限重建 Workplace Search 使用者權限。
 * 先移除所有既有權限再整批寫入。
 */
export class PermissionSyncUseCase {
  private readonly logger = new Logger('PermissionSyncUseCase');

  constructor(
    private readonly directory: ZoomDirectoryPort,
    private readonly index: SearchIndexPort,
    private readonly mapping: PermissionMapping,
    private readonly options: PermissionSyncOptions,
  ) {}

  async execute(): Promise<PermissionStats> {
    const started = Date.now();
    if (!this.options.enabled) {
      this.logger.warn('Exiting as document permissions are disabled');
      throw new PermissionSyncDisabledError();
    }
    if (this.mapping.size === 0) {
      this.logger.error('User mapping is missing or empty', { mappingPath: this.options.mappingPath });
      throw new EmptyMappingError(this.options.mappingPath);
    }

    const granted = await this.collectPermissions();
    const permissionsRemoved = await this.removeAllPermissions();

    for (const [user, permissions] of granted) {
      await this.index.addUserPermissions(user, permissions);
      this.logger.info('Updated permissions for user', { user, count: permissions.length });
    }

    return {
      permissionsRemoved,
      usersUpdated: granted.size,
      durationMs: Date.now() - started,
    };
  }

  /** 每個對應到的使用者取得自身名稱與來源角色授予的讀取權限 */
  private async collectPermissions(): Promise<Map<string, string[]>> {
    const privilegesByMember = new Map<string, Set<string>>();
    for (const role of await this.directory.listRoles()) {
      const privileges = (await this.directory.listRolePrivileges(role.id))
        .filter((privilege) => READ_PRIVILEGES.has(privilege));
      if (privileges.length === 0) continue;
      for (const memberId of await this.directory.listRoleMembers(role.id)) {
        const current = privilegesByMember.get(memberId) ?? new Set<string>();
        privileges.forEach((privilege) => current.add(privilege));
        privilegesByMember.set(memberId, current);
      }
    }

    const granted = new Map<string, Set<string>>();
    for (const [sourceId, targets] of this.mapping) {
      const privileges = privilegesByMember.get(sourceId) ?? new Set<string>();
      for (const target of targets) {
        const permissions = granted.get(target) ?? new Set<string>([target]);
        privileges.forEach((privilege) => permissions.add(privilege));
        granted.set(target, permissions);
      }
    }
    return new Map([...granted].map(([user, permissions]) => [user, [...permissions]]));
  }

  private async removeAllPermissions(): Promise<number> {
    let removed = 0;
    for (const { user, permissions } of await this.index.listPermissions()) {
      if (permissions.length === 0) continue;
      await this.index.removeUserPermissions(user, permissions);
      removed += permissions.length;
    }
    this.logger.info('Removed existing permissions', { count: removed });
    return removed;
  }
}
