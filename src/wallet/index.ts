import dotenv from "dotenv";
import { DEFAULT_SERVICE_NAME, loadConfig } from "./config";
import { sampleTransactions } from "./fixtures/sampleTransactions";
import { GetBalanceUseCase } from "./application/use-cases/GetBalanceUseCase";
import { BalanceReportController } from "./interfaces/cli/BalanceReportController";
import { createLogger, stderrSink } from "../shared/observability/logger";
import { createMetrics } from "../shared/observability/metrics";
import { runInTrace } from "../shared/observability/trace";
import { resolveError } from "../shared/errors/AppError";

dotenv.config();

const start = (): void => {
  const config = loadConfig();
  const logger = createLogger(config.serviceName, stderrSink);
  const metrics = createMetrics(config.serviceName);

  const controller = new BalanceReportController(new GetBalanceUseCase(logger, metrics));
  runInTrace(() => controller.report(config.walletAddress, sampleTransactions));
};

try {
  start();
} catch (error) {
  const resolved = resolveError(error);
  createLogger(DEFAULT_SERVICE_NAME, stderrSink).error("Failed to report wallet balance", {
    code: resolved.code,
    error: resolved.message,
    originalMessage: error instanceof Error ? error.message : String(error)
  });
  process.exit(1);
}
