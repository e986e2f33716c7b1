import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ListResourcesRequestSchema,
  ReadResourceRequestSchema,
  ListPromptsRequestSchema,
  GetPromptRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { AdminRoleSchema, adminRows, buildPrivileges, inviteAdmin, listAdmins } from "./admins.js";
import { MistClient } from "./client.js";
import { DEFAULT_REPORT_FILE, requireConfig, resolveConfig, type Config } from "./config.js";
import { MistApiError, errorMessage } from "./errors.js";
import { readCandidates, triggerSnapshots } from "./firmware-backup.js";
import { collectGatewayRows } from "./firmware-report.js";
import { createLogger, type Logger } from "./logger.js";
import { silentOutput, type Output } from "./output.js";
import { ProgressBar } from "./progress.js";
import { getSelf } from "./session.js";
import { VERSION } from "./version.js";

// ---------------------------------------------------------------------------
// Tool registry
// ---------------------------------------------------------------------------

/** What a tool handler gets: no prompts, no console — stdout is the protocol */
interface ToolContext {
  client: MistClient;
  logger: Logger;
  output: Output;
  progress: ProgressBar;
}

interface JsonObjectSchema {
  type: "object";
  properties: Record<string, unknown>;
  required?: string[];
}

interface ToolDef<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  /** Changes state on the Mist side — hidden in read-only mode */
  write: boolean;
  input: S;
  inputSchema: JsonObjectSchema;
  run(ctx: ToolContext, args: z.infer<S>): Promise<unknown>;
}

export interface Tool {
  name: string;
  description: string;
  write: boolean;
  inputSchema: JsonObjectSchema;
  /** Validates `args` against the tool's input schema first */
  run(ctx: ToolContext, args: unknown): Promise<unknown>;
}

function defineTool<S extends z.ZodTypeAny>(def: ToolDef<S>): Tool {
  return {
    name: def.name,
    description: def.description,
    write: def.write,
    inputSchema: def.inputSchema,
    run: (ctx, args) => def.run(ctx, def.input.parse(args)),
  };
}

const reportFileArgs = z.object({
  inFile: z.string().optional(),
  siteId: z.string().optional(),
});

const reportFileSchema: JsonObjectSchema = {
  type: "object",
  properties: {
    inFile: { type: "string", description: `CSV report written by gateways_report (default: ${DEFAULT_REPORT_FILE})` },
    siteId: { type: "string", description: "Only process devices from this site" },
  },
};

export const TOOLS: Tool[] = [
  defineTool({
    name: "gateways_report",
    description:
      "Report firmware, backup firmware and pending firmware of every SRX gateway module of an org or site. " +
      "module_need_snapshot is true when the backup partition holds another version than the running one.",
    write: false,
    input: z.object({ scope: z.enum(["org", "site"]), scopeId: z.string().min(1) }),
    inputSchema: {
      type: "object",
      properties: {
        scope: { type: "string", enum: ["org", "site"], description: "Retrieve gateways of a whole org or of one site" },
        scopeId: { type: "string", description: "Org ID or site ID, depending on scope" },
      },
      required: ["scope", "scopeId"],
    },
    run: async (ctx, args) => ({
      scope: args.scope,
      scopeId: args.scopeId,
      rows: await collectGatewayRows(ctx, args.scope, args.scopeId),
    }),
  }),
  defineTool({
    name: "gateways_backup_candidates",
    description: "List the SRX gateways of a CSV report whose backup firmware must be refreshed (one entry per device)",
    write: false,
    input: reportFileArgs,
    inputSchema: reportFileSchema,
    run: async (ctx, args) => readCandidates(ctx, args.inFile ?? DEFAULT_REPORT_FILE, args.siteId),
  }),
  defineTool({
    name: "gateways_snapshot",
    description:
      "Trigger a firmware snapshot on every SRX gateway of a CSV report that needs one. " +
      "Each device is processed independently; failures are reported, not retried.",
    write: true,
    input: reportFileArgs,
    inputSchema: reportFileSchema,
    run: async (ctx, args) => {
      const candidates = await readCandidates(ctx, args.inFile ?? DEFAULT_REPORT_FILE, args.siteId);
      const summary = await triggerSnapshots(ctx, candidates);
      return {
        succeeded: summary.succeeded.map((c) => c.cluster_device_id),
        failed: summary.failed.map((f) => ({ deviceId: f.candidate.cluster_device_id ?? null, reason: f.reason })),
      };
    },
  }),
  defineTool({
    name: "admins_list",
    description: "List the administrators of an org with their privileges",
    write: false,
    input: z.object({ orgId: z.string().min(1) }),
    inputSchema: {
      type: "object",
      properties: { orgId: { type: "string", description: "Org ID" } },
      required: ["orgId"],
    },
    run: async (ctx, args) => adminRows(await listAdmins(ctx, args.orgId)),
  }),
  defineTool({
    name: "admins_invite",
    description: "Invite an administrator to an org, on the whole org or on a list of sites",
    write: true,
    input: z.object({
      orgId: z.string().min(1),
      email: z.string().email(),
      firstName: z.string(),
      lastName: z.string(),
      role: AdminRoleSchema,
      siteIds: z.array(z.string()).optional(),
    }),
    inputSchema: {
      type: "object",
      properties: {
        orgId: { type: "string", description: "Org ID" },
        email: { type: "string", description: "Email address of the invited administrator" },
        firstName: { type: "string" },
        lastName: { type: "string" },
        role: { type: "string", enum: AdminRoleSchema.options, description: "Privilege level" },
        siteIds: {
          type: "array",
          items: { type: "string" },
          description: "Restrict the privilege to these sites (omit for the whole org)",
        },
      },
      required: ["orgId", "email", "firstName", "lastName", "role"],
    },
    run: async (ctx, args) => {
      const privileges = buildPrivileges(args.orgId, args.role, args.siteIds);
      await inviteAdmin(ctx, args.orgId, args, privileges);
      return { invited: args.email, privileges };
    },
  }),
];

const toolMap = new Map(TOOLS.map((t) => [t.name, t]));

function textResult(data: unknown, isError = false) {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(data, null, 2) }],
    isError,
  };
}

// ---------------------------------------------------------------------------
// MCP Server
// ---------------------------------------------------------------------------

export interface McpServerOptions {
  transport?: Transport;
  config?: Config;
  fetch?: typeof fetch;
  logger?: Logger;
}

export async function startMcpServer(options: McpServerOptions = {}): Promise<Server> {
  const config = options.config ?? resolveConfig({});
  const logger = options.logger ?? createLogger();
  const readOnly = config.readOnly;

  const server = new Server(
    { name: "mist-ops", version: VERSION },
    { capabilities: { tools: {}, resources: {}, prompts: {} } },
  );

  let client: MistClient | undefined;
  function getClient(): MistClient {
    if (!client) {
      requireConfig(config);
      client = new MistClient(config.host, config.apiToken, { fetch: options.fetch });
    }
    return client;
  }

  // ── ListTools ─────────────────────────────────────────────────────
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    const tools = (readOnly ? TOOLS.filter((t) => !t.write) : TOOLS).map((t) => ({
      name: t.name,
      description: t.description,
      inputSchema: t.inputSchema,
    }));
    return { tools };
  });

  // ── CallTool ──────────────────────────────────────────────────────
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    const tool = toolMap.get(name);

    if (!tool) {
      return textResult({ error: `Unknown tool: ${name}` }, true);
    }

    if (readOnly && tool.write) {
      return textResult(
        { error: `Read-only mode: ${name} is not allowed`, hint: "Unset MIST_READ_ONLY to enable write operations" },
        true,
      );
    }

    try {
      const ctx: ToolContext = {
        client: getClient(),
        logger,
        output: silentOutput,
        progress: new ProgressBar(silentOutput, logger),
      };
      logger.debug({ tool: name }, "tool call");
      return textResult(await tool.run(ctx, args ?? {}));
    } catch (err: unknown) {
      logger.error({ err, tool: name }, "tool call failed");
      return textResult(
        { error: errorMessage(err), detail: err instanceof MistApiError ? err.response : undefined },
        true,
      );
    }
  });

  // ── Resources ─────────────────────────────────────────────────────
  server.setRequestHandler(ListResourcesRequestSchema, async () => ({
    resources: [
      {
        uri: "mist://self",
        name: "Authenticated account",
        description: "The account behind the API token and its org/site privileges",
        mimeType: "application/json",
      },
    ],
  }));

  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    const uri = request.params.uri;
    if (uri !== "mist://self") throw new Error(`Unknown resource URI: ${uri}`);
    const self = await getSelf(getClient());
    return {
      contents: [{ uri, mimeType: "application/json", text: JSON.stringify(self, null, 2) }],
    };
  });

  // ── Prompts ───────────────────────────────────────────────────────
  server.setRequestHandler(ListPromptsRequestSchema, async () => ({
    prompts: [
      {
        name: "gateway-firmware-audit",
        description: "Audit SRX backup firmware for an org and refresh the stale backups",
        arguments: [{ name: "orgId", description: "Org ID to audit", required: true }],
      },
    ],
  }));

  server.setRequestHandler(GetPromptRequestSchema, async (request) => {
    const { name, arguments: promptArgs } = request.params;
    if (name !== "gateway-firmware-audit") throw new Error(`Unknown prompt: ${name}`);
    const orgId = promptArgs?.orgId ?? "<org_id>";
    return {
      messages: [
        {
          role: "user" as const,
          content: {
            type: "text" as const,
            text: [
              `Audit the SRX gateway firmware backups of org "${orgId}".`,
              "",
              "Steps:",
              `1. Use the **gateways_report** tool (scope: "org", scopeId: "${orgId}") to list every gateway module.`,
              "2. Summarise, per site, the modules whose module_need_snapshot is true and those waiting for a reboot.",
              "3. Ask me before using **gateways_snapshot**: it needs a CSV report on disk (run `mist-ops gateways report` first).",
            ].join("\n"),
          },
        },
      ],
    };
  });

  // ── Start ─────────────────────────────────────────────────────────
  const transport = options.transport ?? new StdioServerTransport();
  await server.connect(transport);
  return server;
}
