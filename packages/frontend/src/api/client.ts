import type {
  BorrowRecord,
  BudgetEntry,
  BudgetUpdate,
  OverageCharge,
  PoolStatus,
  Snapshot,
} from '../types/realtime.js';

export const API_BASE = '/api';

export class ApiError extends Error {
  constructor(
    public status: number,
    public statusText: string,
    message: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'ApiError';
  }

  /** The server refused for lack of a seat and says a retry may succeed. */
  get retryable(): boolean {
    return (
      this.status === 409 &&
      typeof this.details === 'object' &&
      this.details !== null &&
      'retryable' in this.details &&
      this.details.retryable === true
    );
  }
}

/** Turn a failed response into an ApiError, using the server's error body when it has one. */
export async function toApiError(response: Response): Promise<ApiError> {
  const errorBody = await response.text();
  let message: string;
  let details: unknown;
  try {
    const parsed: unknown = JSON.parse(errorBody);
    if (typeof parsed === 'object' && parsed !== null) {
      const text = 'message' in parsed ? parsed.message : 'error' in parsed ? parsed.error : undefined;
      message = typeof text === 'string' && text ? text : response.statusText;
      details = 'details' in parsed ? parsed.details : undefined;
    } else {
      message = errorBody || response.statusText;
    }
  } catch {
    message = errorBody || response.statusText;
  }
  return new ApiError(response.status, response.statusText, message, details);
}

export async function apiRequest<T>(endpoint: string, options: RequestInit = {}): Promise<T> {
  const response = await fetch(`${API_BASE}${endpoint}`, {
    ...options,
    credentials: 'include',
    headers: {
      'Content-Type': 'application/json',
      ...options.headers,
    },
  });

  if (!response.ok) {
    throw await toApiError(response);
  }

  // Handle 204 No Content
  if (response.status === 204) {
    return undefined as T;
  }

  return response.json();
}

export const api = {
  get: <T>(endpoint: string) => apiRequest<T>(endpoint),

  post: <T>(endpoint: string, data: unknown) =>
    apiRequest<T>(endpoint, {
      method: 'POST',
      body: JSON.stringify(data),
    }),

  put: <T>(endpoint: string, data: unknown) =>
    apiRequest<T>(endpoint, {
      method: 'PUT',
      body: JSON.stringify(data),
    }),

  delete: <T>(endpoint: string) => apiRequest<T>(endpoint, { method: 'DELETE' }),
};

export const licensesApi = {
  borrow: (tool: string, user: string) => api.post<BorrowRecord>('/licenses/borrow', { tool, user }),

  return: (id: string) => api.post<{ status: 'ok'; tool: string }>('/licenses/return', { id }),

  status: () => api.get<PoolStatus[]>('/licenses/status'),

  toolStatus: (tool: string) => api.get<PoolStatus>(`/licenses/${encodeURIComponent(tool)}/status`),

  borrows: (user?: string) =>
    api.get<BorrowRecord[]>(user ? `/borrows?user=${encodeURIComponent(user)}` : '/borrows'),

  overageCharges: (tool?: string) =>
    api.get<{ charges: OverageCharge[] }>(
      tool ? `/overage-charges?tool=${encodeURIComponent(tool)}` : '/overage-charges'
    ),

  snapshot: () => api.get<Snapshot>('/realtime/snapshot'),
};

export const budgetApi = {
  list: () => api.get<{ tools: BudgetEntry[] }>('/config/budget'),

  update: (budget: BudgetUpdate) => api.put<{ status: 'ok'; tool: string }>('/config/budget', budget),

  deactivate: (tool: string) => api.delete<void>(`/config/budget/${encodeURIComponent(tool)}`),
};

export interface FrontendErrorReport {
  message: string;
  stack?: string;
  source?: string;
  lineno?: number;
  colno?: number;
  url?: string;
  userAgent?: string;
}

export const systemApi = {
  version: () => api.get<{ version: string }>('/version'),

  reportError: (report: FrontendErrorReport) => api.post<{ status: 'ok' }>('/frontend-errors', report),
};
