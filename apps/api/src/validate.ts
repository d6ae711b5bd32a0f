import type { z } from "zod";
import { ValidationError } from "@wxlens/pipeline";

export function parseRequest<T extends z.ZodTypeAny>(schema: T, value: unknown, what: string): z.infer<T> {
  const parsed = schema.safeParse(value ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ValidationError(`invalid ${what}: ${issues.join("; ")}`, { issues });
  }
  return parsed.data;
}

export function assertInt(v: unknown, name: string): number {
  const n = typeof v === "number" ? v : typeof v === "string" && v.trim() ? Number(v) : NaN;
  if (!Number.isFinite(n) || !Number.isInteger(n)) throw new ValidationError(`invalid ${name}`, { field: name, value: v ?? null });
  return n;
}
