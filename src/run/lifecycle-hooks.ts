import type { BenchConfig } from "../config/types.js";
import type { EventBus } from "../events/event-bus.js";
import type { WarningSink } from "../utils/warnings.js";

export type ReceiptMode = "auto" | "writeOnly" | "skip";

export type RunLifecycleContext = {
  bus: EventBus;
  benchmarkId: string;
  benchmarkDir: string;
  config: BenchConfig;
  quiet: boolean;
  receiptMode: ReceiptMode;
  warningSink: WarningSink;
};

export interface RunLifecycleHooks {
  onRunSetup?(context: RunLifecycleContext): Promise<void> | void;
  onRunFinally?(context: RunLifecycleContext): Promise<void> | void;
}
