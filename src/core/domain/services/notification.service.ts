import type { RunSummary } from "../entities/run.entity.js";

export interface INotificationService {
  notifyExhausted(summary: RunSummary): Promise<void>;
}
