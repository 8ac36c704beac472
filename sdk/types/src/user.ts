/**
 * 当前用户的信息，会随事件一起上报，用于定位受影响的用户
 */
export interface User {
  [key: string]: unknown;
  id?: string | number;
  ip_address?: string;
  email?: string;
  username?: string;
}
