import { z } from "zod";

const LIBRARY_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;
const ENV_VARIABLE = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Project layout and test settings. Every field has a default, so an absent
 * config file (or an empty one) yields a complete configuration.
 */
export const projectConfigSchema = z.object({
  library: z
    .object({
      name: z.string().regex(LIBRARY_NAME, "must be a valid crate identifier").default("rawnet"),
      entry: z.string().min(1).default("src/lib.rs"),
    })
    .default({}),
  output_dir: z.string().min(1).default("target"),
  benchmarks: z
    .object({
      native: z.array(z.string().min(1)).default(["benches/c_receiver.c", "benches/c_sender.c"]),
      library: z.array(z.string().min(1)).default(["benches/rs_receiver.rs", "benches/rs_sender.rs"]),
    })
    .default({}),
  testing: z
    .object({
      interface_variable: z.string().regex(ENV_VARIABLE, "must be a valid environment variable name").default("RAWNET_TEST_IFACE"),
      capability: z.string().min(1).default("cap_net_raw+ep"),
    })
    .default({}),
});

export type ProjectConfig = z.infer<typeof projectConfigSchema>;

export const DEFAULT_CONFIG: ProjectConfig = projectConfigSchema.parse({});
