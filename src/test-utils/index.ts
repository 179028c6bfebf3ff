/**
 * Test utilities index
 */

export * from "./fixtures/alerts";
export * from "./helpers";
export * from "./mocks/network";
