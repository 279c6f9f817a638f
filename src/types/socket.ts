/** Per-connection bookkeeping. */
export interface ClientRecord {
  id: string;
  ip?: string;
  connectedAt: number;
}
