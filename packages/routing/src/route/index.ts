export { solveRoute, solveRouteFile } from "./solve.js";
