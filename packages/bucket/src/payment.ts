import { InsufficientBalanceError, ValidationFailedError } from "./errors";

function assertAmount(amount: bigint): void {
  if (amount < 0n) {
    throw new ValidationFailedError("Amount must be non-negative", { amount: amount.toString() });
  }
}

/**
 * A transferable quantity of the payment medium. Value moves between payments
 * by `split` and `join`; it is never created or destroyed by them.
 */
export class Payment {
  private amount: bigint;

  constructor(value: bigint = 0n) {
    assertAmount(value);
    this.amount = value;
  }

  get value(): bigint {
    return this.amount;
  }

  split(amount: bigint): Payment {
    assertAmount(amount);
    if (amount > this.amount) {
      throw new InsufficientBalanceError("Payment too small to split", {
        requested: amount.toString(),
        available: this.amount.toString(),
      });
    }
    this.amount -= amount;
    return new Payment(amount);
  }

  /** Moves the whole of `other` into this payment, leaving `other` at zero. */
  join(other: Payment): void {
    if (other === this) {
      return;
    }
    this.amount += other.drain();
  }

  drain(): bigint {
    const amount = this.amount;
    this.amount = 0n;
    return amount;
  }
}
