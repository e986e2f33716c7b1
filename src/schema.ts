import { z } from "zod";

// ---------------------------------------------------------------------------
// Mist API payloads — only the fields the CLI reads are declared, the rest
// pass through untouched
// ---------------------------------------------------------------------------

const optionalString = z.string().nullish();

export const PrivilegeSchema = z
  .object({
    scope: z.string(),
    role: z.string(),
    name: optionalString,
    org_id: optionalString,
    site_id: optionalString,
    msp_id: optionalString,
  })
  .passthrough();

export const SelfSchema = z
  .object({
    email: optionalString,
    first_name: optionalString,
    last_name: optionalString,
    privileges: z.array(PrivilegeSchema).default([]),
  })
  .passthrough();

export const SiteSchema = z
  .object({
    id: z.string(),
    name: optionalString,
    org_id: optionalString,
  })
  .passthrough();

export const ModuleStatSchema = z
  .object({
    serial: optionalString,
    mac: optionalString,
    model: optionalString,
    version: optionalString,
    backup_version: optionalString,
    pending_version: optionalString,
  })
  .passthrough();

export const DeviceStatSchema = z
  .object({
    id: optionalString,
    name: optionalString,
    type: optionalString,
    version: optionalString,
    site_id: optionalString,
    module_stat: z.array(ModuleStatSchema).nullish(),
    module2_stat: z.array(ModuleStatSchema).nullish(),
  })
  .passthrough();

export const AdminSchema = z
  .object({
    email: optionalString,
    first_name: optionalString,
    last_name: optionalString,
    privileges: z.array(PrivilegeSchema).default([]),
  })
  .passthrough();

export type Privilege = z.infer<typeof PrivilegeSchema>;
export type Self = z.infer<typeof SelfSchema>;
export type Site = z.infer<typeof SiteSchema>;
export type ModuleStat = z.infer<typeof ModuleStatSchema>;
export type DeviceStat = z.infer<typeof DeviceStatSchema>;
export type Admin = z.infer<typeof AdminSchema>;

/** Validate an API payload, naming the operation in the error */
export function parsePayload<T extends z.ZodTypeAny>(schema: T, data: unknown, what: string): z.infer<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length ? ` at ${issue.path.join(".")}` : "";
    throw new Error(`Unexpected ${what} payload${where}: ${issue?.message ?? "invalid"}`);
  }
  return result.data;
}
