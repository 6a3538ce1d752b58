export { createClientFactory, type ClientFactory } from "./client-factory.js";
