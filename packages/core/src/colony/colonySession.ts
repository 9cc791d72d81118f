import { ColonyNotInitializedError } from "../errors";
import { ColonyEngine, type ColonyEngineOptions } from "./colonyEngine";

/**
 * Holds the one colony a caller works with during a session. Consumers take
 * the session (or the engine) as an argument; nothing here is global.
 */
export class ColonySession {
  private engine: ColonyEngine | null = null;

  public initialize(options: ColonyEngineOptions = {}): ColonyEngine {
    this.engine = new ColonyEngine(options);
    return this.engine;
  }

  public attach(engine: ColonyEngine): void {
    this.engine = engine;
  }

  public isInitialized(): boolean {
    return this.engine !== null;
  }

  public require(): ColonyEngine {
    if (!this.engine) {
      throw new ColonyNotInitializedError();
    }
    return this.engine;
  }

  public reset(): void {
    this.engine = null;
  }
}
