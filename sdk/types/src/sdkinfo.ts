export interface SdkInfo {
  // SDK 的名称（例如 lantern.javascript.node）
  name?: string;
  // SDK 的版本号
  version?: string;
}
