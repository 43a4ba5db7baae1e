function shortCode(id: string): string {
     return id.replace(/-/g, '').slice(0, 8).toUpperCase();
}

export function generateOrderNumber(orderId: string): string {
     return `ORD-${shortCode(orderId)}`;
}

export function generateSubOrderNumber(orderNumber: string, sequence: number): string {
     return `${orderNumber}-S${sequence}`;
}

export function generateCaseNumber(caseId: string): string {
     return `CASE-${shortCode(caseId)}`;
}
