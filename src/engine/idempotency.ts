// Source keys for ledger entries. The store keeps source_key unique, so a
// second credit or debit for the same source event is refused.

export function completionCreditKey(applicationId: string) {
  return `credit:application:${applicationId}:completed`;
}

export function redemptionDebitKey(redemptionId: string) {
  return `debit:redemption:${redemptionId}`;
}
