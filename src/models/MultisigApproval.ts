export interface MultisigApproval {
  orderId: string;
  threshold: number;
  approvers: string[];
  satisfiedAt: Date | null;
}
