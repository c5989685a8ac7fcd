export type JsonObject = Record<string, unknown>;

export interface ZoomRequestOptions {
  /** 視為「不存在」的狀態碼；命中時丟出 NotFoundError */
  notFoundStatuses?: readonly number[];
}

export interface ZoomApiPort {
  get(endpoint: string, options?: ZoomRequestOptions): Promise<JsonObject>;
  /** 依 next_page_token 逐頁讀取，合併每頁 `key` 陣列 */
  getPaginated(endpoint: string, key: string, options?: ZoomRequestOptions): Promise<JsonObject[]>;
}
