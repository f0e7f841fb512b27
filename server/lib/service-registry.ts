import logger from "./logger";

export interface Destroyable {
  destroy(): void;
}

interface RegisteredService {
  name: string;
  instance: Destroyable;
  registeredAt: number;
}

/**
 * Tracks live services so shutdown can release caches and database handles.
 * Several instances may share a name (tests build many managers); each is
 * kept until it unregisters itself or `destroyAll` runs.
 */
class ServiceRegistry {
  private services: RegisteredService[] = [];

  register(name: string, instance: Destroyable): void {
    this.services.push({ name, instance, registeredAt: Date.now() });
  }

  unregister(instance: Destroyable): void {
    this.services = this.services.filter((entry) => entry.instance !== instance);
  }

  destroyAll(): void {
    // newest first: the manager goes before the store it writes to
    const entries = [...this.services].reverse();
    this.services = [];
    for (const { name, instance } of entries) {
      try {
        instance.destroy();
        logger.debug(`Service destroyed: ${name}`);
      } catch (e) {
        logger.error(`Failed to destroy service: ${name}`, {
          error: e instanceof Error ? e.message : String(e),
        });
      }
    }
  }

  getRegisteredNames(): string[] {
    return this.services.map((entry) => entry.name);
  }

  getCount(): number {
    return this.services.length;
  }
}

export const serviceRegistry = new ServiceRegistry();
