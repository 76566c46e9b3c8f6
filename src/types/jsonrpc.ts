/**
 * JSON-RPC 2.0 Type Definitions
 */

export interface JSONRPCRequest {
  jsonrpc: '2.0';
  method: string;
  params: unknown[];
  id: string | number | null;
}

/**
 * Health check response type
 */
export interface HealthCheckResponse {
  status: 'healthy' | 'degraded';
  timestamp: string;
  uptime: number;
  version: string;
  upstream: 'connected' | 'disconnected';
}

/**
 * Diagnostic report served on /test
 */
export interface DiagnosticReport {
  backend: 'running';
  database: string;
  databaseUrl: 'set' | 'not set';
  databaseName: 'set' | 'not set';
  connectionStatus: 'connected' | 'not connected';
  tables: string[];
  solanaRpc: string;
}
