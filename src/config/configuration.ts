export interface HyperliquidConfig {
  infoUrl: string;
  timeoutMs: number;
}

export interface ServerConfig {
  host: string;
  port: number;
}

export interface AppConfig {
  hyperliquid: HyperliquidConfig;
  server: ServerConfig;
}

function readInt(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

// Loaded by ConfigModule.forRoot; values come from the environment / .env
export default (): AppConfig => ({
  hyperliquid: {
    infoUrl: process.env.HYPERLIQUID_INFO_URL ?? 'https://api.hyperliquid.xyz/info',
    timeoutMs: readInt(process.env.HYPERLIQUID_TIMEOUT_MS, 10000),
  },
  server: {
    host: process.env.SERVER_HOST ?? '0.0.0.0',
    port: readInt(process.env.SERVER_PORT, 8081),
  },
});
