import { Counter, Registry } from "prom-client";

export type BalanceOutcome = "ok" | "InvalidWalletAddress" | "NoTransactions" | "ZeroAmount";

export type BalanceMetrics = {
  recordBalanceCalculation: (outcome: BalanceOutcome) => void;
};

export type Metrics = BalanceMetrics & {
  registry: Registry;
};

export const createMetrics = (service: string): Metrics => {
  const registry = new Registry();
  registry.setDefaultLabels({ service });

  const balanceCalculations = new Counter({
    name: "wallet_balance_calculations_total",
    help: "Total wallet balance calculations by outcome",
    labelNames: ["service", "outcome"],
    registers: [registry]
  });

  return {
    registry,
    recordBalanceCalculation: (outcome) => balanceCalculations.inc({ service, outcome })
  };
};
