import { ConfigError, ValidationError } from "../errors.js";
import type { ActionDescriptor } from "../graph/types.js";
import type { ActionRunner } from "./contract.js";

/** Builds the runner for one action. Called once per dispatch. */
export type RunnerFactory = (descriptor: Readonly<ActionDescriptor>) => ActionRunner;

export class RunnerRegistry {
  private factories = new Map<string, RunnerFactory>();

  add(kind: string, factory: RunnerFactory): void {
    if (this.factories.has(kind)) {
      throw new ConfigError("DUPLICATE_REGISTRATION", `Runner kind "${kind}" already registered`);
    }
    this.factories.set(kind, factory);
  }

  /** Register or replace. Returns true when an existing kind was replaced. */
  set(kind: string, factory: RunnerFactory): boolean {
    const replaced = this.factories.has(kind);
    this.factories.set(kind, factory);
    return replaced;
  }

  remove(kind: string): boolean {
    return this.factories.delete(kind);
  }

  get(kind: string): RunnerFactory | undefined {
    return this.factories.get(kind);
  }

  has(kind: string): boolean {
    return this.factories.has(kind);
  }

  kinds(): string[] {
    return [...this.factories.keys()];
  }

  create(descriptor: Readonly<ActionDescriptor>): ActionRunner {
    const factory = this.factories.get(descriptor.kind);
    if (!factory) {
      throw new ValidationError(
        "UnknownRunnerKind",
        `Action "${descriptor.id}" uses unknown runner kind "${descriptor.kind}"`,
        { actionId: descriptor.id, kind: descriptor.kind },
      );
    }
    return factory(descriptor);
  }
}
