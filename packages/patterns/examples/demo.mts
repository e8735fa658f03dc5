/**
 * Runs each creational pattern sample and prints its output.
 *
 *   npm run demo:patterns
 */

import { Result } from "@creational/errors";
import { loggerFactory } from "@creational/logger";

import {
  BikeFactory,
  BurgerBuilder,
  CarFactory,
  ExcelDocumentFactory,
  NotificationApp,
  OrderBuilder,
  PdfDocumentFactory,
  WordDocumentFactory,
  describeVehicle,
  exportDocument,
  getNotificationFactory,
  getPaymentFactory,
  parseNotificationChannel,
  parsePaymentMethod,
} from "../src/index.mjs";

const { logger } = loggerFactory({ name: "patterns-demo", pretty: true });

console.log("Factory Method Pattern Demo\n");
for (const factory of [new CarFactory(), new BikeFactory()]) {
  console.log(describeVehicle(factory));
}
for (const factory of [
  new PdfDocumentFactory(),
  new WordDocumentFactory(),
  new ExcelDocumentFactory(),
]) {
  console.log(exportDocument(factory));
}

const method = parsePaymentMethod("Card");
if (Result.isOk(method)) {
  console.log(getPaymentFactory(method.data).createPayment().process(1500));
}

console.log("\nAbstract Factory Pattern Demo\n");
const messages = [
  ["email", "Your order is shipped"],
  ["sms", "Your OTP is 000000"],
  ["fax", "Unreachable"],
] as const;
for (const [input, message] of messages) {
  const channel = parseNotificationChannel(input);
  if (Result.isErr(channel)) {
    logger.warn(channel.error.message, { fields: channel.error.fields });
    continue;
  }
  new NotificationApp(getNotificationFactory(channel.data), { logger }).notify(
    message,
  );
}

console.log("\nBuilder Pattern Demo\n");
console.log(
  String(
    new BurgerBuilder("Medium").addCheese().addLettuce().addTomato().build(),
  ),
);
console.log(String(new BurgerBuilder("Large").addExtraPatty().addPepperoni().build()));

const order = new OrderBuilder("123", "Corner Kitchen")
  .deliverTo("12 Test Street")
  .withCoupon("001")
  .build();
if (order.success) {
  console.log(order.data);
} else {
  logger.error(order.error.message, { fields: order.error.fields });
}
