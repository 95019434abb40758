export interface HealthResponse {
  status: 'ok';
  uptimeSeconds: number;
}
