import { readFile } from 'node:fs/promises';
import ini from 'ini';
import { z } from 'zod';
import { ConfigurationError } from '../errors/warehouse-errors.js';

export const DatabricksProfileSchema = z.object({
  host: z.string().optional(),
  token: z.string().optional(),
  client_id: z.string().optional(),
  client_secret: z.string().optional(),
  auth_type: z.string().optional(),
  warehouse_id: z.string().optional()
});

export type DatabricksProfile = z.infer<typeof DatabricksProfileSchema>;

export type ProfileReader = (path: string, profile: string) => Promise<DatabricksProfile>;

/**
 * Reads one profile section of a `.databrickscfg` file. A missing file or
 * section yields an empty profile.
 */
export const readDatabricksProfile: ProfileReader = async (path, profile) => {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      return {};
    }
    throw new ConfigurationError(
      `Failed to read ${path}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      { cause: error }
    );
  }
  return parseDatabricksProfile(text, profile, path);
};

export function parseDatabricksProfile(text: string, profile: string, source = 'profile file'): DatabricksProfile {
  const section: unknown = ini.parse(text)[profile];
  if (section === undefined) {
    return {};
  }

  const parsed = DatabricksProfileSchema.safeParse(section);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(
      `Profile [${profile}] in ${source} is invalid: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unreadable section'}`
    );
  }
  return parsed.data;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
