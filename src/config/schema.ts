import { z } from "zod";

/** `null` in YAML (`ports:` with no value) counts as absent. */
function optional<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((v) => v ?? undefined);
}

const text = z.string({ invalid_type_error: "must be a string" });
const flag = z.boolean({ invalid_type_error: "must be true or false" });
const stringList = z.array(z.string({ invalid_type_error: "must be a string" }), {
  invalid_type_error: "must be a list of strings",
});

function port(max: number) {
  const message = `must be an integer between 0 and ${max}`;
  return z.number({ invalid_type_error: message }).int({ message }).min(0, { message }).max(max, { message });
}

const MAPPING = { invalid_type_error: "must be a mapping" };

export const MountConfigSchema = z.object(
  {
    location: z.string({ required_error: "is required", invalid_type_error: "must be a string" }).min(1, "is required"),
    /** Defaults to `location` (after ~ expansion). */
    mountPoint: optional(text),
    writable: optional(flag),
  },
  MAPPING,
);

export type MountConfig = z.infer<typeof MountConfigSchema>;

export const AgentConfigSchema = z.object(
  {
    binary: optional(text),
    defaultArgs: optional(stringList),
    /** Appended when reattaching to a previous session (recreate, attach). */
    resumeArgs: optional(stringList),
    /** Flag that appends to the assistant's system prompt. Empty disables the port note. */
    systemPromptFlag: optional(text),
  },
  MAPPING,
);

export type AgentConfig = z.infer<typeof AgentConfigSchema>;

/**
 * Shape shared by the global (~/.config/treebox/config.yml) and the local
 * (treebox.yml) file. Merge rules live in loader.ts.
 */
export const FileConfigSchema = z.object(
  {
    /** Use this image as-is instead of building Dockerfile.sandbox or the bundled image. */
    image: optional(text),
    ports: optional(port(64)),
    portRange: optional(
      z.object({ start: optional(port(65535)), end: optional(port(65536)) }, MAPPING),
    ),
    branchPrefix: optional(text),
    fetchRemote: optional(flag),
    // YAML turns `PORT: 3000` into a number; keep the user's intent.
    env: optional(
      z.record(
        z
          .union([z.string(), z.number(), z.boolean()], {
            errorMap: () => ({ message: "must be a string, number or boolean" }),
          })
          .transform((v) => String(v)),
        MAPPING,
      ),
    ),
    mounts: optional(z.array(MountConfigSchema, { invalid_type_error: "must be a list" })),
    agent: optional(AgentConfigSchema),
  },
  { invalid_type_error: "must be a mapping" },
);

export type FileConfig = z.infer<typeof FileConfigSchema>;

export interface ResolvedConfig {
  image?: string;
  ports: number;
  portRange: { start: number; end: number };
  branchPrefix: string;
  fetchRemote: boolean;
  env: Record<string, string>;
  mounts: MountConfig[];
  agent: {
    binary: string;
    defaultArgs: string[];
    resumeArgs: string[];
    systemPromptFlag: string;
  };
}

export class ConfigError extends Error {
  constructor(path: string, message: string) {
    super(`${path}: ${message}`);
    this.name = "ConfigError";
  }
}

/** `["mounts", 0, "location"]` -> `mounts[0].location` */
function describeKey(path: (string | number)[]): string {
  return path.reduce<string>(
    (key, segment) => (typeof segment === "number" ? `${key}[${segment}]` : key ? `${key}.${segment}` : segment),
    "",
  );
}

/**
 * Validate a parsed YAML document. An empty file is an empty config.
 * Only the first problem is reported.
 */
export function parseFileConfig(raw: unknown, path: string): FileConfig {
  if (raw === undefined || raw === null) return {};
  const result = FileConfigSchema.safeParse(raw);
  if (result.success) return result.data;

  const issue = result.error.issues[0];
  const key = describeKey(issue.path);
  throw new ConfigError(path, key ? `'${key}' ${issue.message}` : `top level ${issue.message}`);
}
