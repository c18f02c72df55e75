import { z } from "zod";
import { fromZodError } from "zod-validation-error";

const id = z.string().trim().min(1);

const maintenanceCommandSchema = z.discriminatedUnion("action", [
  z.object({ action: z.literal("list-deleted") }).strict(),
  z.object({ action: z.literal("delete-product"), barcode: id }).strict(),
  z.object({ action: z.literal("restore-product"), id }).strict(),
  z.object({ action: z.literal("delete-alias"), id }).strict(),
  z.object({
    action: z.literal("scheme-active"),
    id,
    active: z.enum(["true", "false"]).transform((value) => value === "true"),
  }).strict(),
  z.object({ action: z.literal("delete-scheme"), id }).strict(),
  // Price one code against a fresh catalog snapshot
  z.object({
    action: z.literal("price"),
    code: id,
    qty: z.coerce.number().finite().default(1),
    uom: z.string().trim().min(1).optional(),
  }).strict(),
]);

export type MaintenanceCommand = z.output<typeof maintenanceCommandSchema>;

const FLAG_PATTERN = /^--([a-z]+)=(.*)$/;

/**
 * Parse `<action> --flag=value ...` as passed to scripts/catalog-maintenance.ts
 *
 * @throws Error naming the bad argument or the failed field
 */
export function parseMaintenanceCommand(argv: readonly string[]): MaintenanceCommand {
  const [action, ...rest] = argv;
  const flags: Record<string, string> = {};

  for (const arg of rest) {
    const match = FLAG_PATTERN.exec(arg);
    if (!match) throw new Error(`Unrecognized argument "${arg}"; expected --name=value`);
    const [, name, value] = match;
    flags[name] = value;
  }

  const parsed = maintenanceCommandSchema.safeParse({ ...flags, action });
  if (!parsed.success) {
    throw new Error(`Invalid maintenance command: ${fromZodError(parsed.error).message}`);
  }
  return parsed.data;
}
