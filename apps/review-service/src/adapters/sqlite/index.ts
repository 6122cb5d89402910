export { ReviewDatabase } from "./ReviewDatabase.js";
