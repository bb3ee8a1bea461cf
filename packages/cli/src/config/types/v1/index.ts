export * from "./jail-profile.js";
