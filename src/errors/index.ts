export * from "./taxonomy.js";
