// Wire types shared with the license server. Field names follow the JSON.

export interface PoolStatus {
  tool: string;
  total: number;
  borrowed: number;
  available: number;
  commit: number;
  max_overage: number;
  overage: number;
  in_commit: boolean;
  commit_price: number;
  overage_price_per_license: number;
  overage_borrows: number;
  current_overage_cost: number;
  total_cost: number;
  active: boolean;
}

export interface BorrowEvent {
  tool: string;
  user: string;
  timestamp: string;
  is_overage: boolean;
}

// One minute of activity for one pool
export interface MinuteBucket {
  timestamp: string;
  count: number;
  overage_count: number;
  users: string[];
}

export interface Rates {
  borrow_per_min: number;
  return_per_min: number;
  failure_per_min: number;
  overage_percent: number;
}

export interface Snapshot {
  tick: number;
  generated_at: string;
  tools: PoolStatus[];
  rates: Rates;
  recent_events: { borrows: BorrowEvent[] };
  tool_metrics: Record<string, MinuteBucket[]>;
  buffer_stats: { total_events: number };
}

export interface BorrowRecord {
  id: string;
  tool: string;
  user: string;
  borrowed_at: string;
  is_overage: boolean;
}

export interface OverageCharge {
  id: string;
  tool: string;
  borrow_id: string;
  user: string;
  charged_at: string;
  amount: number;
}

export interface BudgetEntry {
  tool: string;
  total: number;
  borrowed: number;
  commit: number;
  max_overage: number;
  commit_price: number;
  overage_price_per_license: number;
  active: boolean;
}

export interface BudgetUpdate {
  tool: string;
  total: number;
  commit: number;
  max_overage: number;
  commit_price: number;
  overage_price_per_license: number;
}
