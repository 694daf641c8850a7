export {
  MCP_CONFIG_FILE,
  McpConfigSchema,
  McpServerSchema,
  StdioServerSchema,
  RemoteServerSchema,
  isRemoteServer,
  parseMcpConfig,
  loadMcpConfig,
  serializeMcpConfig,
  writeMcpConfig,
  addMcpServer,
  removeMcpServer,
  mergeMcpConfigs,
} from "./config.ts";
export type { McpConfig, McpServer, StdioServer, RemoteServer } from "./config.ts";
