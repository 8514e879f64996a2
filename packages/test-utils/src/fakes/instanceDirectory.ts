import type { InstanceDescription, InstanceDirectory } from '@pgrotate/rotation';

/**
 * Instance directory over a fixed list of instances
 */
export class FakeInstanceDirectory implements InstanceDirectory {
  readonly lookups: string[] = [];
  failure?: Error;

  constructor(private readonly instances: InstanceDescription[] = []) {}

  async describeInstances(identifier: string): Promise<InstanceDescription[]> {
    this.lookups.push(identifier);
    if (this.failure) {
      throw this.failure;
    }
    return this.instances.filter((instance) => instance.identifier === identifier);
  }
}
