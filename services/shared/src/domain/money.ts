// Amounts are decimal currency units; arithmetic is done in whole cents.

export function toCents(amount: number): number {
     return Math.round(amount * 100);
}

export function fromCents(cents: number): number {
     return cents / 100;
}

export function roundMoney(amount: number): number {
     return fromCents(toCents(amount));
}

export function lineTotal(unitPrice: number, quantity: number): number {
     return fromCents(toCents(unitPrice) * quantity);
}

export function sumMoney(amounts: readonly number[]): number {
     return fromCents(amounts.reduce((sum, amount) => sum + toCents(amount), 0));
}

/**
 * Split an amount into `parts` equal shares. Cents that do not divide evenly
 * go to the first share, so the shares always add up to the amount.
 */
export function splitEvenly(amount: number, parts: number): number[] {
     if (!Number.isInteger(parts) || parts < 1) {
          throw new RangeError(`Cannot split an amount into ${parts} parts`);
     }

     const totalCents = toCents(amount);
     const baseShare = Math.floor(totalCents / parts);
     const remainder = totalCents - baseShare * parts;

     return Array.from({ length: parts }, (_, index) =>
          fromCents(index === 0 ? baseShare + remainder : baseShare)
     );
}
