import { AnalysisWorker } from "./analysis-worker.js";
import { WORKER_KINDS, WorkerKind } from "./types.js";

export type WorkerFactory<K extends WorkerKind> = () => AnalysisWorker<K>;

type FactoryTable = { [K in WorkerKind]?: WorkerFactory<K> };

export class WorkerRegistry {
  private factories: FactoryTable = {};

  register<K extends WorkerKind>(kind: K, factory: WorkerFactory<K>): void {
    const factories: { [P in K]?: WorkerFactory<P> } = this.factories;
    factories[kind] = factory;
  }

  get<K extends WorkerKind>(kind: K): WorkerFactory<K> {
    const factory = this.factories[kind];
    if (!factory) throw new Error(`No worker registered for kind: ${kind}`);
    return factory;
  }

  has(kind: WorkerKind): boolean {
    return this.factories[kind] !== undefined;
  }

  missing(): WorkerKind[] {
    return WORKER_KINDS.filter((kind) => !this.has(kind));
  }
}
