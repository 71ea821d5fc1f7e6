import type { InferenceGate } from "../gate/inference_gate";
import type { GateStats } from "../gate/types";
import type { ModelHandle } from "../model/model_handle";

export type HealthReport = {
  status: "healthy" | "unhealthy";
  timestamp: string;
  service: string;
  version: string;
  checks: {
    model: ReturnType<ModelHandle["describe"]>;
    gate: GateStats | null;
  };
};

type ServiceInfo = { service: string; version: string };

// a busy gate is still ready
export class HealthReporter {
  constructor(
    private readonly model: ModelHandle,
    private readonly gate: InferenceGate | null,
    private readonly info: ServiceInfo,
  ) {}

  isReady(): boolean {
    return this.model.isReady && this.gate !== null;
  }

  report(now: Date = new Date()): HealthReport {
    return {
      status: this.isReady() ? "healthy" : "unhealthy",
      timestamp: now.toISOString(),
      service: this.info.service,
      version: this.info.version,
      checks: {
        model: this.model.describe(),
        gate: this.gate?.stats() ?? null,
      },
    };
  }
}
