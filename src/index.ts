export * from "./AtCommand.js";
export * from "./AtChannel.js";
export * from "./AtDispatcher.js";
export * from "./AtRegistry.js";
export * from "./AtResponse.js";
export * from "./AsyncSerialPort.js";
export * from "./classifier.js";
export * from "./cme.js";
export * from "./dialect.js";
export * from "./encoder.js";
export * from "./errors.js";
export * from "./parameters.js";
export * from "./parser.js";
export * from "./sessionCommands.js";
export * from "./tokenizer.js";
