export { StackController } from "./controller";
