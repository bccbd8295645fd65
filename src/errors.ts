export class DashboardError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Remote fetch failed: network, HTTP status, auth or query. */
export class ConnectivityError extends DashboardError {
    readonly status?: number;

    constructor(message: string, options?: { cause?: unknown; status?: number }) {
        super(message, options);
        this.status = options?.status;
    }
}

export class TimeoutError extends DashboardError {
    readonly timeoutMs: number;

    constructor(timeoutMs: number, options?: { cause?: unknown }) {
        super(`Remote fetch timed out after ${timeoutMs}ms`, options);
        this.timeoutMs = timeoutMs;
    }
}

export interface RowError {
    line: number;
    message: string;
}

export class ParseError extends DashboardError {
    readonly rowErrors: RowError[];
    readonly parsedRows: number;
    readonly totalRows: number;

    constructor(message: string, rowErrors: RowError[] = [], parsedRows = 0, totalRows = 0) {
        super(message);
        this.rowErrors = rowErrors;
        this.parsedRows = parsedRows;
        this.totalRows = totalRows;
    }
}

export class ConfigurationError extends DashboardError {}
