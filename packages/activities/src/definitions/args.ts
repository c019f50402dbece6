import { z } from "zod";
import { NonRetryableActivityError } from "@strand/utils";

/** Bad arguments will not get better on retry. */
export function parseArgs<T extends z.ZodTypeAny>(activityName: string, schema: T, args: unknown): z.infer<T> {
  const parsed = schema.safeParse(args);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    throw new NonRetryableActivityError(`Invalid arguments for ${activityName}: ${issues}`);
  }
  return parsed.data;
}
