import { SecretManagerServiceClient } from "@google-cloud/secret-manager";

/**
 * Key/value lookup by logical secret name.
 * Resolves to undefined when the secret does not exist; throws when the
 * store itself cannot be reached or refuses the caller.
 */
export interface SecretStore {
  readonly name: string;
  get(secretName: string): Promise<string | undefined>;
}

// gRPC status codes
const NOT_FOUND = 5;

interface AccessedVersion {
  payload?: { data?: Uint8Array | string | null } | null;
}

/** The slice of SecretManagerServiceClient the store calls. */
export interface AccessClient {
  accessSecretVersion(
    request: { name: string },
    options: { timeout: number }
  ): Promise<[AccessedVersion, ...unknown[]]>;
}

export class GcpSecretStore implements SecretStore {
  readonly name = "gcp-secret-manager";
  private readonly client: AccessClient;

  constructor(
    private readonly projectId: string,
    private readonly timeoutMs = 10000,
    client?: AccessClient
  ) {
    this.client = client ?? new SecretManagerServiceClient();
  }

  async get(secretName: string): Promise<string | undefined> {
    const name = `projects/${this.projectId}/secrets/${secretName}/versions/latest`;

    try {
      const [version] = await this.client.accessSecretVersion(
        { name },
        { timeout: this.timeoutMs }
      );
      const data = version.payload?.data;
      if (data === null || data === undefined) return undefined;
      return typeof data === "string" ? data : Buffer.from(data).toString("utf-8");
    } catch (error) {
      if (grpcCode(error) === NOT_FOUND) return undefined;
      throw error;
    }
  }
}

function grpcCode(error: unknown): number | undefined {
  if (!(error instanceof Error)) return undefined;
  const code: unknown = Reflect.get(error, "code");
  return typeof code === "number" ? code : undefined;
}
