/** 以儲存層計數為準的完成度 */
export interface VerificationReport {
  range: string;
  total: number;
  translated: number;
  pending: number;
  /** 百分比，取到小數點後一位 */
  percentage: number;
  complete: boolean;
}
