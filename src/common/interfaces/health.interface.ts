// GET /health body
export interface HealthResponse {
  status: 'ok';
  service: string;
  version: string;
  timestamp: string;
  uptime: number;       // seconds since process start
}
