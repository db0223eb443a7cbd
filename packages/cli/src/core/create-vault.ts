import path from "node:path"
import { SecretsManagerClient } from "@aws-sdk/client-secrets-manager"
import {
  AwsSecretsManagerVault,
  EnvSecretVault,
  GcpSecretManagerVault,
  JsonFileSecretVault,
  type ReadableSecretVault,
} from "@envlayer/secrets"
import { SecretManagerServiceClient } from "@google-cloud/secret-manager"
import type { GlobalArgs } from "./cli-args"
import { UsageError } from "./usage-error"

/**
 * Builds the secret provider named by `--secrets`.
 *
 * @returns undefined for "none"
 */
export function createVault(args: GlobalArgs, cwd: string): ReadableSecretVault | undefined {
  const prefix = args.secretsPrefix

  switch (args.secrets) {
    case "none":
      return undefined

    case "env":
      return new EnvSecretVault({ ...(prefix !== undefined && { prefix }) })

    case "file":
      if (!args.secretsFile) throw new UsageError("--secrets file requires --secrets-file")

      return new JsonFileSecretVault({ path: path.resolve(cwd, args.secretsFile) })

    case "aws":
      return new AwsSecretsManagerVault(
        { client: new SecretsManagerClient({}) },
        { ...(prefix !== undefined && { prefix }) },
      )

    case "gcp":
      if (!args.gcpProject) throw new UsageError("--secrets gcp requires --gcp-project")

      return new GcpSecretManagerVault(
        { client: new SecretManagerServiceClient() },
        { projectId: args.gcpProject, ...(prefix !== undefined && { prefix }) },
      )
  }
}
