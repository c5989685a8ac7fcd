/** Zoom 端可同步的物件種類 */
export const OBJECT_TYPES = [
  'users',
  'roles',
  'groups',
  'meetings',
  'past_meetings',
  'recordings',
  'channels',
  'chats',
  'files',
] as const;

export type ObjectType = (typeof OBJECT_TYPES)[number];

/** 帳號層級物件：不分 user bucket，也不套用時間窗 */
export const ACCOUNT_WIDE_TYPES: readonly ObjectType[] = ['roles', 'groups'];

/** 依 user 分桶抓取的物件，順序即抓取順序（meetings 必須先於 past_meetings） */
export const USER_SCOPED_TYPES: readonly ObjectType[] = [
  'users',
  'meetings',
  'past_meetings',
  'recordings',
  'channels',
  'chats',
  'files',
];

/** 每次 sync 結束會寫入 checkpoint 的物件 */
export const TIME_WINDOWED_TYPES: readonly ObjectType[] = USER_SCOPED_TYPES;
