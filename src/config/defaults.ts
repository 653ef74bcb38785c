import type { ResolvedConfig } from "./schema.js";

export const DEFAULT_CONFIG: ResolvedConfig = {
  ports: 3,
  portRange: { start: 49152, end: 65535 },
  branchPrefix: "task/",
  fetchRemote: true,
  env: {},
  mounts: [],
  agent: {
    binary: "claude",
    defaultArgs: ["--dangerously-skip-permissions"],
    resumeArgs: ["--continue"],
    systemPromptFlag: "--append-system-prompt",
  },
};

/** Home of the `agent` user in the bundled image. */
export const CONTAINER_HOME = "/home/agent";

/** Tag of the image built from the bundled docker/Dockerfile. */
export const DEFAULT_IMAGE = "treebox:latest";
