import { readFile } from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

import { ConfigurationError, describeError } from "../errors.js";

/** Non-empty string, trimmed before validation. */
const requiredText = z
  .string()
  .transform((value) => value.trim())
  .pipe(z.string().min(1, "must not be empty"));

const kubernetesTargetSchema = z
  .object({
    namespace: requiredText,
    deployment: requiredText,
  })
  .strict();

const tabSchema = z
  .object({
    text: requiredText,
    iconUrl: requiredText,
    iframeUrl: requiredText,
    tabColor: requiredText.nullish().transform((value) => value ?? null),
    k8s: kubernetesTargetSchema.nullish().transform((value) => value ?? null),
  })
  .strict();

export const tabsConfigSchema = z
  .object({
    tabs: z.array(tabSchema).min(1, "at least one tab must be defined"),
  })
  .strict();

export type KubernetesTarget = z.infer<typeof kubernetesTargetSchema>;
export type TabConfig = z.infer<typeof tabSchema>;
export type TabsConfig = z.infer<typeof tabsConfigSchema>;

/** Renders zod issues as `path: message` pairs joined by semicolons. */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/** Parses and validates the YAML text of a tabs file. */
export function parseTabsConfig(text: string, source = "<inline>"): TabsConfig {
  let document: unknown;
  try {
    document = parseYaml(text);
  } catch (error) {
    throw new ConfigurationError(`tabs file ${source} is not valid YAML: ${describeError(error)}`, { source }, error);
  }

  const result = tabsConfigSchema.safeParse(document);
  if (!result.success) {
    throw new ConfigurationError(`tabs file ${source} is invalid: ${formatIssues(result.error)}`, {
      source,
      issues: result.error.issues,
    });
  }
  return result.data;
}

export async function loadTabsConfig(path: string): Promise<TabsConfig> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    throw new ConfigurationError(`unable to read tabs file ${path}: ${describeError(error)}`, { source: path }, error);
  }
  return parseTabsConfig(text, path);
}
