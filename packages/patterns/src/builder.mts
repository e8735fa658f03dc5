import { Result, createValidationError } from "@creational/errors";

import type { ValidationError } from "@creational/errors";

export type BurgerIngredient =
  | "Cheese"
  | "Lettuce"
  | "Tomato"
  | "Pepperoni"
  | "Extra Patty";

/**
 * Immutable once built; only {@link BurgerBuilder.build} creates one.
 */
export class Burger {
  readonly ingredients: readonly BurgerIngredient[];

  constructor(
    readonly size: string,
    ingredients: readonly BurgerIngredient[],
  ) {
    this.ingredients = Object.freeze([...ingredients]);
    Object.freeze(this);
  }

  toString(): string {
    const ingredients =
      this.ingredients.length > 0 ? this.ingredients.join(", ") : "Plain";
    return `Burger(Size=${this.size}, Ingredients=[${ingredients}])`;
  }
}

/**
 * @example
 * ```ts
 * const burger = new BurgerBuilder("Medium").addCheese().addTomato().build();
 * String(burger); // "Burger(Size=Medium, Ingredients=[Cheese, Tomato])"
 * ```
 */
export class BurgerBuilder {
  private readonly ingredients: BurgerIngredient[] = [];

  constructor(private readonly size: string) {
    if (size.trim() === "") {
      throw new RangeError("Burger size must be provided");
    }
  }

  addCheese(): this {
    return this.add("Cheese");
  }

  addLettuce(): this {
    return this.add("Lettuce");
  }

  addTomato(): this {
    return this.add("Tomato");
  }

  addPepperoni(): this {
    return this.add("Pepperoni");
  }

  addExtraPatty(): this {
    return this.add("Extra Patty");
  }

  build(): Burger {
    return new Burger(this.size, this.ingredients);
  }

  private add(ingredient: BurgerIngredient): this {
    this.ingredients.push(ingredient);
    return this;
  }
}

export interface Order {
  readonly orderId: string;
  readonly restaurantName: string;
  readonly deliveryAddress?: string;
  readonly couponCode?: string;
  readonly instructions?: string;
  readonly addOns: readonly string[];
}

export class OrderBuilder {
  private deliveryAddress?: string;
  private couponCode?: string;
  private instructions?: string;
  private readonly addOns: string[] = [];

  constructor(
    private readonly orderId: string,
    private readonly restaurantName: string,
  ) {}

  deliverTo(address: string): this {
    this.deliveryAddress = address;
    return this;
  }

  withCoupon(code: string): this {
    this.couponCode = code;
    return this;
  }

  withInstructions(text: string): this {
    this.instructions = text;
    return this;
  }

  addAddOn(item: string): this {
    this.addOns.push(item);
    return this;
  }

  build(): Result<Order, ValidationError> {
    const fields: Record<string, string[]> = {};
    if (this.orderId.trim() === "") {
      fields.orderId = ["is required"];
    }
    if (this.restaurantName.trim() === "") {
      fields.restaurantName = ["is required"];
    }
    if (Object.keys(fields).length > 0) {
      return Result.err(createValidationError("Invalid order", fields));
    }

    const order: Order = {
      orderId: this.orderId,
      restaurantName: this.restaurantName,
      addOns: Object.freeze([...this.addOns]),
      ...(this.deliveryAddress !== undefined && {
        deliveryAddress: this.deliveryAddress,
      }),
      ...(this.couponCode !== undefined && { couponCode: this.couponCode }),
      ...(this.instructions !== undefined && {
        instructions: this.instructions,
      }),
    };
    return Result.ok(Object.freeze(order));
  }
}
