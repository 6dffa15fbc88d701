import { describe, expect, it } from "vitest";
import { InsufficientBalanceError, ValidationFailedError } from "../src/errors";
import { Payment } from "../src/payment";

describe("Payment", () => {
  it("splits value off without creating any", () => {
    const payment = new Payment(100n);
    const part = payment.split(30n);
    expect(part.value).toBe(30n);
    expect(payment.value).toBe(70n);
  });

  it("refuses to split more than it holds", () => {
    const payment = new Payment(5n);
    expect(() => payment.split(6n)).toThrow(InsufficientBalanceError);
    expect(payment.value).toBe(5n);
  });

  it("join moves the whole of the other payment", () => {
    const target = new Payment(1n);
    const source = new Payment(9n);
    target.join(source);
    expect(target.value).toBe(10n);
    expect(source.value).toBe(0n);
  });

  it("joining itself is a no-op", () => {
    const payment = new Payment(4n);
    payment.join(payment);
    expect(payment.value).toBe(4n);
  });

  it("rejects negative amounts", () => {
    expect(() => new Payment(-1n)).toThrow(ValidationFailedError);
    expect(() => new Payment(3n).split(-1n)).toThrow(ValidationFailedError);
  });

  it("drain empties the payment", () => {
    const payment = new Payment(12n);
    expect(payment.drain()).toBe(12n);
    expect(payment.value).toBe(0n);
  });
});
