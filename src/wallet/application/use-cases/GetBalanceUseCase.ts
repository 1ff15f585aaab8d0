import { Result } from "neverthrow";
import { Transaction } from "../../domain/entities/Transaction";
import { BalanceError, describeBalanceError } from "../../domain/errors/BalanceError";
import { calculateBalance } from "../../domain/services/BalanceCalculator";
import { Logger } from "../../../shared/observability/logger";
import { BalanceMetrics } from "../../../shared/observability/metrics";

export class GetBalanceUseCase {
  constructor(
    private readonly logger: Logger,
    private readonly metrics: BalanceMetrics
  ) {}

  execute(walletAddress: string, transactions: readonly Transaction[]): Result<bigint, BalanceError> {
    this.logger.info("Get balance started", {
      walletAddress,
      transactionCount: transactions.length
    });

    const result = calculateBalance(walletAddress, transactions);
    if (result.isOk()) {
      this.metrics.recordBalanceCalculation("ok");
      this.logger.info("Get balance completed", {
        walletAddress,
        balance: result.value.toString()
      });
    } else {
      this.metrics.recordBalanceCalculation(result.error.kind);
      this.logger.warn("Get balance failed", {
        walletAddress,
        kind: result.error.kind,
        error: describeBalanceError(result.error)
      });
    }
    return result;
  }
}
