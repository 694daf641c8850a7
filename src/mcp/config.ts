/**
 * .mcp.json — project MCP server configuration read by the host at launch.
 *
 *   { "mcpServers": { "<name>": { "command": "npx", "args": [...] } } }
 *
 * stdio servers carry command/args/env; http and sse servers carry url/headers.
 * `${VAR}` placeholders are left verbatim; the host expands them.
 */
import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { z } from "zod";
import { McpConfigError, errorToString } from "../infra/errors.ts";
import { getLogger } from "../infra/logger.ts";

const logger = getLogger("mcp_config");

export const MCP_CONFIG_FILE = ".mcp.json";

export const StdioServerSchema = z
  .object({
    type: z.literal("stdio").optional(),
    command: z.string().min(1),
    args: z.array(z.string()).optional(),
    env: z.record(z.string(), z.string()).optional(),
  })
  .strict();

export const RemoteServerSchema = z
  .object({
    type: z.enum(["http", "sse"]),
    url: z.string().url(),
    headers: z.record(z.string(), z.string()).optional(),
  })
  .strict();

export const McpServerSchema = z.union([StdioServerSchema, RemoteServerSchema]);

const ServerNameSchema = z.string().regex(/^\S+$/, "server names must be non-empty and contain no whitespace");

export const McpConfigSchema = z
  .object({
    mcpServers: z.record(ServerNameSchema, McpServerSchema).default({}),
  })
  .strict();

export type StdioServer = z.infer<typeof StdioServerSchema>;
export type RemoteServer = z.infer<typeof RemoteServerSchema>;
export type McpServer = z.infer<typeof McpServerSchema>;
export type McpConfig = z.infer<typeof McpConfigSchema>;

export function isRemoteServer(server: McpServer): server is RemoteServer {
  return server.type === "http" || server.type === "sse";
}

/** Parse .mcp.json text. Throws McpConfigError on bad JSON or schema violations. */
export function parseMcpConfig(text: string): McpConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new McpConfigError(`Invalid JSON in ${MCP_CONFIG_FILE}: ${errorToString(err)}`);
  }

  const result = McpConfigSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${where}: ${issue.message}`;
    });
    throw new McpConfigError(`Invalid ${MCP_CONFIG_FILE}: ${problems.join("; ")}`);
  }
  return result.data;
}

/** Load .mcp.json; a missing file is an empty config. */
export function loadMcpConfig(filePath: string): McpConfig {
  if (!existsSync(filePath)) {
    return { mcpServers: {} };
  }
  return parseMcpConfig(readFileSync(filePath, "utf-8"));
}

export function serializeMcpConfig(config: McpConfig): string {
  return `${JSON.stringify(config, null, 2)}\n`;
}

export function writeMcpConfig(filePath: string, config: McpConfig): void {
  writeFileSync(filePath, serializeMcpConfig(config), "utf-8");
  logger.info({ filePath, servers: Object.keys(config.mcpServers) }, "mcp_config_written");
}

/** Return a new config with `server` added under `name`. */
export function addMcpServer(
  config: McpConfig,
  name: string,
  server: McpServer,
  options: { replace?: boolean } = {},
): McpConfig {
  if (!ServerNameSchema.safeParse(name).success) {
    throw new McpConfigError(`Invalid MCP server name: "${name}"`);
  }
  if (Object.hasOwn(config.mcpServers, name) && !options.replace) {
    throw new McpConfigError(`MCP server "${name}" already exists`);
  }

  const parsed = McpServerSchema.safeParse(server);
  if (!parsed.success) {
    throw new McpConfigError(
      `Invalid MCP server "${name}": ${parsed.error.issues.map((i) => i.message).join("; ")}`,
    );
  }
  return { ...config, mcpServers: { ...config.mcpServers, [name]: parsed.data } };
}

/** Return a new config without `name`. Throws when it is not present. */
export function removeMcpServer(config: McpConfig, name: string): McpConfig {
  if (!Object.hasOwn(config.mcpServers, name)) {
    throw new McpConfigError(`MCP server "${name}" not found`);
  }
  const { [name]: _removed, ...rest } = config.mcpServers;
  return { ...config, mcpServers: rest };
}

/** Merge `extra` into `base`; entries already in `base` win. */
export function mergeMcpConfigs(base: McpConfig, extra: McpConfig): { config: McpConfig; added: string[] } {
  const added = Object.keys(extra.mcpServers).filter((name) => !Object.hasOwn(base.mcpServers, name));
  const mcpServers = { ...base.mcpServers };
  for (const name of added) {
    const server = extra.mcpServers[name];
    if (server) mcpServers[name] = server;
  }
  return { config: { ...base, mcpServers }, added };
}
