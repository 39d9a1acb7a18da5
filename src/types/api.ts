export interface ErrorResponse {
    error: string;
}

export interface NotFoundResponse extends ErrorResponse {
    path: string;
    method: string;
}

export interface HealthCheckResponse {
    status: 'healthy';
    timestamp: string;
    version: string;
    environment: string;
}
