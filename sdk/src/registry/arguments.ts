import { DeployerError, UnknownEntryPointError } from '../errors/index.js';
import type { ArgOverrides, ArgValue, EntryPointSpec, TypedArg } from '../types/deploy.js';
import { checkArgValue, coerceArgValue, formatCLType } from '../utils/cl-type.js';

/**
 * Entry-point name to typed argument schema. Pure lookup: the defaults are
 * copied on every build so callers can never mutate the table.
 */
export class ArgumentRegistry {
  private readonly specs: ReadonlyMap<string, EntryPointSpec>;

  public constructor(entryPoints: readonly EntryPointSpec[]) {
    this.specs = new Map(entryPoints.map((spec) => [spec.name, spec]));
  }

  public entryPointNames(): string[] {
    return [...this.specs.keys()];
  }

  public spec(entryPoint: string): EntryPointSpec {
    const spec = this.specs.get(entryPoint);
    if (!spec) {
      throw new UnknownEntryPointError(entryPoint, this.entryPointNames());
    }
    return spec;
  }

  public signature(entryPoint: string): string {
    const args = this.spec(entryPoint).args.map((arg) => `${arg.name}: ${formatCLType(arg.type)}`);
    return `${entryPoint}(${args.join(', ')})`;
  }

  public buildArguments(entryPoint: string, overrides: ArgOverrides = {}): TypedArg[] {
    const spec = this.spec(entryPoint);
    const declared = new Set(spec.args.map((arg) => arg.name));
    for (const name of Object.keys(overrides)) {
      if (!declared.has(name)) {
        throw new DeployerError('INVALID_INPUT', `Entry point '${entryPoint}' has no argument '${name}'`);
      }
    }

    return spec.args.map((arg) => {
      const override = overrides[arg.name];
      if (override === undefined) {
        return { name: arg.name, type: structuredClone(arg.type), value: structuredClone(arg.value) };
      }
      const problem = checkArgValue(arg.type, override);
      if (problem !== undefined) {
        throw new DeployerError(
          'INVALID_INPUT',
          `Argument '${arg.name}' of '${entryPoint}' (${formatCLType(arg.type)}): ${problem}`,
        );
      }
      return { name: arg.name, type: structuredClone(arg.type), value: structuredClone(override) };
    });
  }

  /** Parses `name=value` pairs against the entry point's declared types. */
  public parseOverrides(entryPoint: string, pairs: readonly string[]): ArgOverrides {
    const spec = this.spec(entryPoint);
    const overrides: Record<string, ArgValue> = {};
    for (const pair of pairs) {
      const separator = pair.indexOf('=');
      if (separator <= 0) {
        throw new DeployerError('INVALID_INPUT', `Expected name=value, got '${pair}'`);
      }
      const name = pair.slice(0, separator);
      const arg = spec.args.find((candidate) => candidate.name === name);
      if (!arg) {
        throw new DeployerError('INVALID_INPUT', `Entry point '${entryPoint}' has no argument '${name}'`);
      }
      overrides[name] = coerceArgValue(arg.type, pair.slice(separator + 1));
    }
    return overrides;
  }
}
