export function getConfigPath(): string {
  return process.env["NETCOMPLY_CONFIG_PATH"] ?? "netcomply.config.json";
}
