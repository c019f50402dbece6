export { vectorPoints } from "./vector-points.js";
