/** OAuth token 狀態；expiry 為 epoch 毫秒 */
export interface CredentialState {
  refreshToken: string;
  accessToken: string;
  accessTokenExpiry: number;
}

/** Zoom user id → Workplace Search 使用者名稱 */
export type PermissionMapping = ReadonlyMap<string, readonly string[]>;
