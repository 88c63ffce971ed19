export * from "./bot-knowledge-links.js";
export * from "./bots.js";
export * from "./knowledge-base.js";
