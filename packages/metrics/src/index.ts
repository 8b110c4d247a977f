export * from "./aggregate";
export * from "./bucket";
export * from "./calendar";
export * from "./config";
export * from "./issues";
export * from "./normalize";
export * from "./pipeline";
export * from "./priority";
export * from "./profile";
export * from "./project";
export * from "./shares";
