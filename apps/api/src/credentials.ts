import { mkdtemp, rm, writeFile } from "fs/promises";
import path from "path";
import { z } from "zod";

export class CredentialsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CredentialsError";
  }
}

const ServiceAccountKeySchema = z
  .object({
    type: z.string().optional(),
    client_email: z.string().min(1),
    private_key: z.string().min(1)
  })
  .passthrough();

export type ServiceAccountKey = z.infer<typeof ServiceAccountKeySchema>;

export function parseServiceAccountKey(raw: string): ServiceAccountKey {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new CredentialsError("GOOGLE_CREDENTIALS is not valid JSON");
  }

  const result = ServiceAccountKeySchema.safeParse(parsed);
  if (!result.success) {
    const fields = result.error.issues.map((issue) => issue.path.join(".")).join(", ");
    throw new CredentialsError(`GOOGLE_CREDENTIALS is missing service account fields: ${fields}`);
  }
  return result.data;
}

/**
 * Writes the key material to a private temporary file for the lifetime of
 * `use`. The file and its directory are removed on every exit path.
 */
export async function withCredentialFile<T>(
  content: string,
  tmpDir: string,
  use: (keyFile: string) => Promise<T>
): Promise<T> {
  const dir = await mkdtemp(path.join(tmpDir, "sheet-relay-"));
  try {
    const keyFile = path.join(dir, "credentials.json");
    await writeFile(keyFile, content, { encoding: "utf8", mode: 0o600 });
    return await use(keyFile);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}
