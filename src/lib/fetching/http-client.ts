/**
 * HTTP transport
 * undici fetch with certificate validation disabled (legacy government sites
 * often serve broken chains)
 */

import { Agent, fetch as undiciFetch } from 'undici';
import { HttpClient } from './fetching.types';

let insecureAgent: Agent | null = null;

const getInsecureAgent = (): Agent => {
  if (!insecureAgent) {
    insecureAgent = new Agent({
      connect: { rejectUnauthorized: false },
    });
  }
  return insecureAgent;
};

export const undiciHttpClient: HttpClient = async (url, options) => {
  const response = await undiciFetch(url, {
    method: 'GET',
    headers: {
      Accept: 'text/html, application/xhtml+xml, application/xml;q=0.9, */*;q=0.8',
      ...options.headers,
    },
    redirect: 'follow',
    signal: options.signal,
    dispatcher: getInsecureAgent(),
  });

  return {
    status: response.status,
    text: () => response.text(),
    discard: async () => {
      await response.body?.cancel();
    },
  };
};

/**
 * Close pooled connections (server shutdown)
 */
export const closeHttpClient = async (): Promise<void> => {
  if (insecureAgent) {
    const agent = insecureAgent;
    insecureAgent = null;
    await agent.close();
  }
};
