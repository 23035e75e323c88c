import type { Context } from "hono";
import { z } from "zod/v4";
import { runUpdate } from "../../context.js";
import { ValidationError } from "../../utils/errors.js";
import type { AppEnv } from "../middleware.js";

const UpdateBodySchema = z.object({
  realms: z.string().optional(),
  topItems: z.number().optional(),
  includeAllItems: z.boolean().optional(),
});

async function readBody(c: Context<AppEnv>): Promise<unknown> {
  const text = await c.req.text();
  if (text.trim() === "") return {};
  try {
    return JSON.parse(text);
  } catch {
    throw new ValidationError("Request body must be JSON");
  }
}

export async function triggerUpdate(c: Context<AppEnv>) {
  const parsed = UpdateBodySchema.safeParse(await readBody(c));
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.map(String).join("."));
    throw new ValidationError(`Invalid update request: ${fields.join(", ")}`);
  }

  const summary = await runUpdate(c.get("ctx"), parsed.data);
  return c.json({ data: summary });
}
