export * from "./utils/base-tool";
export * from "./utils/bytes";
export * from "./utils/chains";
export * from "./utils/cli-runner";
export * from "./utils/errors";
export * from "./utils/file-operations";
export * from "./utils/functions";
export * from "./utils/logger";
export * from "./utils/rpc";

export * from "./libs/ubt/uint256";
export * from "./libs/ubt/slot";
export * from "./libs/ubt/tree-index";
export * from "./libs/state-format/state-file";
export * from "./libs/state-format/stem-index";
export * from "./libs/state-format/state-reader";
export * from "./libs/helpers/balance-extractor";
export * from "./libs/helpers/state-builder";
export * from "./libs/helpers/state-writer";
export * from "./libs/helpers/state-pipeline";
export * from "./libs/helpers/wallet-list";
