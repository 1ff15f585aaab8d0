import { z } from "zod";
import { AppError } from "../shared/errors/AppError";
import { ALICE_ADDRESS } from "./fixtures/sampleTransactions";

export const DEFAULT_SERVICE_NAME = "wallet-balance";
export const DEFAULT_WALLET_ADDRESS = ALICE_ADDRESS;

const configSchema = z.object({
  SERVICE_NAME: z.string().trim().min(1).default(DEFAULT_SERVICE_NAME),
  WALLET_ADDRESS: z.string().default(DEFAULT_WALLET_ADDRESS)
});

export type Config = {
  serviceName: string;
  walletAddress: string;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): Config => {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const variables = parsed.error.issues.map((issue) => issue.path.join("."));
    throw new AppError("INVALID_CONFIG", `Invalid configuration: ${variables.join(", ")}`);
  }
  return {
    serviceName: parsed.data.SERVICE_NAME,
    walletAddress: parsed.data.WALLET_ADDRESS
  };
};
