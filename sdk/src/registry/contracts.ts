import { DeployerError } from '../errors/index.js';
import type { ContractProfile } from '../types/deploy.js';
import { ArgumentRegistry } from './arguments.js';

export class ContractRegistry {
  private readonly profiles: ReadonlyMap<string, ContractProfile>;

  public constructor(profiles: readonly ContractProfile[]) {
    this.profiles = new Map(profiles.map((profile) => [profile.name, profile]));
  }

  public names(): string[] {
    return [...this.profiles.keys()];
  }

  public get(name: string): ContractProfile {
    const profile = this.profiles.get(name);
    if (!profile) {
      throw new DeployerError('INVALID_INPUT', `Unknown contract '${name}' (known: ${this.names().join(', ')})`);
    }
    return profile;
  }

  public argumentsFor(name: string): ArgumentRegistry {
    return new ArgumentRegistry(this.get(name).entryPoints);
  }
}
