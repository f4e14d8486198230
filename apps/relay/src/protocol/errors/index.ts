export { RelayError } from "./relay-error";
