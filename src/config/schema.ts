import { isAbsolute } from 'node:path';
import { z } from 'zod';

/** A directory inside the project, such as `omnibus` or `libs/parsley` */
const packageDir = z
  .string()
  .min(1)
  .refine((dir) => !isAbsolute(dir) && !dir.split(/[\\/]/).includes('..'), {
    message: 'Must be a directory inside the project',
  });

/** Shape of wr.yml. Unknown keys are kept for other tools sharing the file. */
export const configSchema = z
  .object({
    project_name: z.string().min(1).optional(),
    commands: z.record(z.string().min(1)).default({}),
    local_packages: z.array(packageDir).optional(),
  })
  .passthrough();

export type WrConfig = z.infer<typeof configSchema>;

export const DEFAULT_CONFIG_FILE = 'wr.yml';
