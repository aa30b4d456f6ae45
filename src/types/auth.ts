/** Who a tool call acts for. Resolved before any handler runs. */
export interface AuthContext {
  userId: string;
}
