import { GetBalanceUseCase } from "../../../src/wallet/application/use-cases/GetBalanceUseCase";
import { Transaction } from "../../../src/wallet/domain/entities/Transaction";
import { createMetrics } from "../../../src/shared/observability/metrics";
import {
  ALICE_ADDRESS,
  BOB_ADDRESS,
  sampleTransactions
} from "../../../src/wallet/fixtures/sampleTransactions";

describe("GetBalanceUseCase", () => {
  const makeLogger = () => ({
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn()
  });

  const makeMetrics = () => ({
    recordBalanceCalculation: jest.fn()
  });

  it("retorna saldo", () => {
    const logger = makeLogger();
    const metrics = makeMetrics();
    const useCase = new GetBalanceUseCase(logger, metrics);

    const result = useCase.execute(ALICE_ADDRESS, sampleTransactions);

    expect(result._unsafeUnwrap()).toBe(75n);
    expect(metrics.recordBalanceCalculation).toHaveBeenCalledWith("ok");
    expect(logger.info).toHaveBeenCalledWith("Get balance started", {
      walletAddress: ALICE_ADDRESS,
      transactionCount: 5
    });
    expect(logger.info).toHaveBeenCalledWith("Get balance completed", {
      walletAddress: ALICE_ADDRESS,
      balance: "75"
    });
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("registra falha de valor zero", () => {
    const logger = makeLogger();
    const metrics = makeMetrics();
    const useCase = new GetBalanceUseCase(logger, metrics);

    const result = useCase.execute(ALICE_ADDRESS, [Transaction.deposit(ALICE_ADDRESS, 0n)]);

    expect(result._unsafeUnwrapErr()).toEqual({ kind: "ZeroAmount" });
    expect(metrics.recordBalanceCalculation).toHaveBeenCalledWith("ZeroAmount");
    expect(logger.warn).toHaveBeenCalledWith("Get balance failed", {
      walletAddress: ALICE_ADDRESS,
      kind: "ZeroAmount",
      error: "Amount cannot be zero"
    });
  });

  it("registra falha de endereço inválido", () => {
    const logger = makeLogger();
    const metrics = makeMetrics();
    const useCase = new GetBalanceUseCase(logger, metrics);

    const result = useCase.execute(BOB_ADDRESS, sampleTransactions);

    expect(result.isErr()).toBe(true);
    expect(metrics.recordBalanceCalculation).toHaveBeenCalledWith("InvalidWalletAddress");
    expect(logger.warn).toHaveBeenCalledWith("Get balance failed", {
      walletAddress: BOB_ADDRESS,
      kind: "InvalidWalletAddress",
      error: `Invalid wallet address: ${BOB_ADDRESS}`
    });
  });

  it("contabiliza cálculos por resultado", async () => {
    const metrics = createMetrics("test");
    const useCase = new GetBalanceUseCase(makeLogger(), metrics);

    useCase.execute(ALICE_ADDRESS, sampleTransactions);
    useCase.execute(ALICE_ADDRESS, sampleTransactions);
    useCase.execute(ALICE_ADDRESS, []);

    const snapshot = await metrics.registry
      .getSingleMetric("wallet_balance_calculations_total")
      ?.get();

    expect(snapshot?.values).toEqual(
      expect.arrayContaining([
        expect.objectContaining({ value: 2, labels: { service: "test", outcome: "ok" } }),
        expect.objectContaining({
          value: 1,
          labels: { service: "test", outcome: "NoTransactions" }
        })
      ])
    );
  });
});
