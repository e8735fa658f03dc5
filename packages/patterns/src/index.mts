/**
 * Factory method, abstract factory and builder samples.
 *
 * @packageDocumentation
 */

export * from "./factory-method.mjs";
export * from "./abstract-factory.mjs";
export * from "./builder.mjs";
