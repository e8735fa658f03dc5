/**
 * Factory method: each creator subclass decides which product to build.
 * Client code only sees the abstract creator and product.
 *
 * @module factory-method
 */

import { Result, createValidationError } from "@creational/errors";

import type { ValidationError } from "@creational/errors";

// ============================================================================
// Vehicles
// ============================================================================

export interface Vehicle {
  drive(): string;
}

export class Car implements Vehicle {
  drive(): string {
    return "Driving a car";
  }
}

export class Bike implements Vehicle {
  drive(): string {
    return "Riding a bike";
  }
}

export abstract class VehicleFactory {
  abstract createVehicle(): Vehicle;
}

export class CarFactory extends VehicleFactory {
  createVehicle(): Vehicle {
    return new Car();
  }
}

export class BikeFactory extends VehicleFactory {
  createVehicle(): Vehicle {
    return new Bike();
  }
}

export const describeVehicle = (factory: VehicleFactory): string =>
  factory.createVehicle().drive();

// ============================================================================
// Documents
// ============================================================================

export interface ExportableDocument {
  export(): string;
}

export class PdfDocument implements ExportableDocument {
  export(): string {
    return "Exporting PDF document";
  }
}

export class WordDocument implements ExportableDocument {
  export(): string {
    return "Exporting Word document";
  }
}

export class ExcelDocument implements ExportableDocument {
  export(): string {
    return "Exporting Excel document";
  }
}

export abstract class DocumentFactory {
  abstract createDocument(): ExportableDocument;
}

export class PdfDocumentFactory extends DocumentFactory {
  createDocument(): ExportableDocument {
    return new PdfDocument();
  }
}

export class WordDocumentFactory extends DocumentFactory {
  createDocument(): ExportableDocument {
    return new WordDocument();
  }
}

export class ExcelDocumentFactory extends DocumentFactory {
  createDocument(): ExportableDocument {
    return new ExcelDocument();
  }
}

export const exportDocument = (factory: DocumentFactory): string =>
  factory.createDocument().export();

// ============================================================================
// Payments
// ============================================================================

export const PAYMENT_METHODS = ["card", "upi", "netbanking"] as const;
export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

export interface Payment {
  readonly method: PaymentMethod;
  /**
   * @throws {RangeError} when `amount` is not a positive finite number
   */
  process(amount: number): string;
}

abstract class BasePayment implements Payment {
  abstract readonly method: PaymentMethod;
  protected abstract readonly label: string;

  process(amount: number): string {
    if (!Number.isFinite(amount) || amount <= 0) {
      throw new RangeError(`Payment amount must be positive, got ${amount}`);
    }
    return `Payment done through ${this.label}: ${amount.toFixed(2)}`;
  }
}

export class CreditCardPayment extends BasePayment {
  readonly method = "card";
  protected readonly label = "CreditCard";
}

export class UpiPayment extends BasePayment {
  readonly method = "upi";
  protected readonly label = "UPI";
}

export class NetBankingPayment extends BasePayment {
  readonly method = "netbanking";
  protected readonly label = "NetBanking";
}

export abstract class PaymentFactory {
  abstract createPayment(): Payment;
}

export class CreditCardPaymentFactory extends PaymentFactory {
  createPayment(): Payment {
    return new CreditCardPayment();
  }
}

export class UpiPaymentFactory extends PaymentFactory {
  createPayment(): Payment {
    return new UpiPayment();
  }
}

export class NetBankingPaymentFactory extends PaymentFactory {
  createPayment(): Payment {
    return new NetBankingPayment();
  }
}

const paymentFactories: Record<PaymentMethod, () => PaymentFactory> = {
  card: () => new CreditCardPaymentFactory(),
  upi: () => new UpiPaymentFactory(),
  netbanking: () => new NetBankingPaymentFactory(),
};

export const getPaymentFactory = (method: PaymentMethod): PaymentFactory =>
  paymentFactories[method]();

const isPaymentMethod = (value: string): value is PaymentMethod =>
  PAYMENT_METHODS.some((method) => method === value);

/**
 * Parses user input such as `"UPI"` or `" card "` into a payment method.
 */
export function parsePaymentMethod(
  input: string,
): Result<PaymentMethod, ValidationError> {
  const normalized = input.trim().toLowerCase();
  if (isPaymentMethod(normalized)) {
    return Result.ok(normalized);
  }
  return Result.err(
    createValidationError(`Unsupported payment method: ${input}`, {
      method: [`must be one of ${PAYMENT_METHODS.join(", ")}`],
    }),
  );
}
