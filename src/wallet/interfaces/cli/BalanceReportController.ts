import { Transaction } from "../../domain/entities/Transaction";
import { describeBalanceError } from "../../domain/errors/BalanceError";
import { GetBalanceUseCase } from "../../application/use-cases/GetBalanceUseCase";

export type ReportOutput = {
  out: (line: string) => void;
  err: (line: string) => void;
};

export const processOutput: ReportOutput = {
  out: (line) => process.stdout.write(`${line}\n`),
  err: (line) => process.stderr.write(`${line}\n`)
};

export class BalanceReportController {
  constructor(
    private readonly getBalanceUseCase: GetBalanceUseCase,
    private readonly output: ReportOutput = processOutput
  ) {}

  report(walletAddress: string, transactions: readonly Transaction[]): void {
    this.getBalanceUseCase.execute(walletAddress, transactions).match(
      (balance) => this.output.out(`Balance for ${walletAddress}: ${balance.toString()}`),
      (error) => this.output.err(`Error calculating balance: ${describeBalanceError(error)}`)
    );
  }
}
