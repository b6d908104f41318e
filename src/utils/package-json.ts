import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';

const PackageJsonSchema = z.object({
  name: z.string().min(1),
  version: z.string().default('0.0.0'),
  description: z.string().default(''),
});

export type PackageJson = z.infer<typeof PackageJsonSchema>;

/**
 * Read service metadata from the package.json in `dir`.
 * Feeds the Swagger title and version and the logger's service name.
 */
export function readPackageJson(dir: string = process.cwd()): PackageJson {
  const packageJsonPath = path.join(dir, 'package.json');

  if (!fs.existsSync(packageJsonPath)) {
    throw new Error(`package.json not found at ${packageJsonPath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8'));
  } catch (error) {
    throw new Error(
      `Failed to parse package.json: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const parsed = PackageJsonSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid package.json at ${packageJsonPath}: missing "name"`);
  }

  return parsed.data;
}

/**
 * "template-mailer-service" -> "Template Mailer Service"
 */
export function titleCase(str: string): string {
  return str
    .split('-')
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}
