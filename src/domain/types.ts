export interface Transaction {
  id: string;
  /** UTC, `YYYY-MM-DDTHH:mm:ss.sssZ`. */
  timestamp: string;
  fuelType: string;
  quantity: number;
  unitPrice: number;
  totalAmount: number;
  stationId: string;
  pumpId: string | null;
  paymentMethod: string | null;
}

export interface TransactionPayload {
  text: string;
  transaction: Transaction;
}

export interface TransactionDocument extends TransactionPayload {
  id: string;
}

export interface IndexEntry {
  id: string;
  vector: number[];
  payload: TransactionPayload;
}

export interface StoredEntry {
  id: string;
  payload: TransactionPayload;
}

export interface RetrievalHit {
  entry: StoredEntry;
  score: number;
}

export interface TransactionFilter {
  fuelTypes?: string[];
  stationIds?: string[];
  paymentMethods?: string[];
  /** Inclusive lower bound, ISO timestamp. */
  from?: string;
  /** Inclusive upper bound, ISO timestamp. */
  to?: string;
}

export interface IndexManifest {
  embeddingModel: string;
  dimension: number;
}
