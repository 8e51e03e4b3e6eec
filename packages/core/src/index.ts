export * from "./config/Config";
export * from "./resolver/LanguageResolver";
export * from "./cache/RuntimeCache";
export * from "./installer/PackageSource";
export { WasmerPackageSource } from "./installer/WasmerPackageSource";
export * from "./installer/ModuleValidator";
export * from "./installer/Installer";
export * from "./gate/prompt";
export * from "./gate/ConfirmationGate";
export * from "./engine/ExecutionEngine";
export * from "./utils/Error";
export * from "./utils/Logger";
