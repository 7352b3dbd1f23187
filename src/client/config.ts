// Server URL configuration
// Set SERVER_URL (host:port) and SERVER_SECURE=true to override
// Example: SERVER_URL=myserver.com:2567 SERVER_SECURE=true

type Env = Record<string, string | undefined>;

export interface ClientConfig {
  serverUrl: string;
  wsUrl: string;
  apiUrl: string;
}

export function loadClientConfig(env: Env = typeof process === 'undefined' ? {} : process.env): ClientConfig {
  const serverUrl = env.SERVER_URL || 'localhost:2567';
  const isSecure = env.SERVER_SECURE === 'true';

  const wsProtocol = isSecure ? 'wss' : 'ws';
  const httpProtocol = isSecure ? 'https' : 'http';

  return {
    serverUrl,
    wsUrl: `${wsProtocol}://${serverUrl}`,
    apiUrl: `${httpProtocol}://${serverUrl}`,
  };
}

export const config = loadClientConfig();
