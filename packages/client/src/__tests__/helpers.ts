import { Client, type ClientConfig } from '../client.js';
import { FakeSpecServer } from './fake-server.js';

export async function connect(server = new FakeSpecServer(), config: ClientConfig = {}) {
  const client = await Client.connect({ transport: server, logger: false, ...config });
  return { server, client };
}

/** Let every queued frame reach the client */
export function flush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}
