import { parsePositiveInt } from "../../lib/validators";
import { DEFAULT_TOP } from "../rankings/service";
import type { PipelineOptions } from "./service";

export interface CliArgs extends PipelineOptions {
  top: number;
}

export const parseArgs = (args: string[]): CliArgs => {
  const result: CliArgs = { top: DEFAULT_TOP };
  const valueOf = (flag: string, alias?: string) => {
    const index = args.findIndex((arg) => arg === flag || arg === alias);
    return index >= 0 ? args[index + 1] : undefined;
  };

  if (args.includes("--live")) result.mode = "live";
  if (args.includes("--statistics")) result.mode = "statistics";
  if (args.includes("--force") || args.includes("-f")) result.force = true;
  if (args.includes("--all")) result.fetchAll = true;

  const concurrency = valueOf("--concurrency", "-c");
  if (concurrency !== undefined) {
    result.concurrency = Math.min(50, parsePositiveInt(concurrency, 10));
  }
  const top = valueOf("--top", "-n");
  if (top !== undefined) result.top = parsePositiveInt(top, DEFAULT_TOP);
  return result;
};
