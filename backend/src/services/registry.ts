export class ServiceNotFoundError extends Error {
  code = 'service.not_found';
  constructor(public readonly serviceName: string) {
    super(`No instance registered for service ${serviceName}`);
    this.name = 'ServiceNotFoundError';
  }
}

/** Name resolution: where an instance of a logical service can be reached. */
export interface ServiceRegistry {
  resolve(serviceName: string): URL;
}

/** Fixed name → base URL table, typically from SERVICE_URLS. */
export class StaticServiceRegistry implements ServiceRegistry {
  private readonly instances = new Map<string, URL>();

  constructor(entries: Record<string, string>) {
    for (const [name, url] of Object.entries(entries)) {
      this.instances.set(name, new URL(url));
    }
  }

  resolve(serviceName: string): URL {
    const url = this.instances.get(serviceName);
    if (!url) {
      throw new ServiceNotFoundError(serviceName);
    }
    return url;
  }
}
