import type { Readable } from "node:stream";
import type { TransformResult } from "../entities/report.entity.js";

export interface ITransformPipeline {
  transform(items: Readable, modifiers: Readable): Promise<TransformResult>;
}
