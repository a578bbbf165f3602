#!/usr/bin/env tsx
// Regenerates stem-index.bin from a stem-sorted state.bin
//
// Ex: npm run stem-index -- --input ./usdc-demo/state.bin --output ./usdc-demo/stem-index.bin --verify

import {
  BaseTool,
  StateFormatError,
  StateStoreReader,
  buildStemIndex,
  compareBytes,
  computeStem,
  computeTreeKey,
  decodeStateFile,
  encodeStemIndex,
  getFileStats,
  numberWithCommas,
  readBytes,
  runTool,
  writeFile,
  type CLIOptions,
  type ToolContext,
} from "../index";

interface StemIndexOptions extends CLIOptions {
  input: string;
  output: string;
  verify: boolean;
}

class StemIndexTool extends BaseTool {
  private readonly options: StemIndexOptions;

  constructor(options: StemIndexOptions, context: ToolContext) {
    super(
      {
        name: "stem-index",
        description: "Generate stem index from state.bin",
      },
      context,
    );
    this.options = options;
  }

  async execute(): Promise<void> {
    const { logger } = this.context;
    const { input, output } = this.options;

    const stateData = await readBytes(input);
    const { header, entries } = decodeStateFile(stateData);
    logger.info(`State file: ${numberWithCommas(header.entryCount)} entries at block #${header.blockNumber}`);

    let previous: Uint8Array | undefined;
    const stems = entries.map((entry, i) => {
      const key = computeTreeKey(entry.address, entry.treeIndex);
      if (previous && compareBytes(previous, key) > 0) {
        throw new StateFormatError("entries-not-sorted", `${input} is not sorted by tree key at entry ${i}`);
      }
      previous = key;
      return computeStem(entry.address, entry.treeIndex);
    });

    const stemIndex = buildStemIndex(stems);
    logger.info(`Found ${numberWithCommas(stemIndex.length)} unique stems`);

    const encoded = encodeStemIndex(stemIndex);
    await writeFile(output, encoded);
    const { size } = await getFileStats(output);
    logger.info(`Stem index written to ${output}: ${(size / 1024).toFixed(1)} KB`);

    if (this.options.verify) {
      logger.info("Verifying stem index...");
      StateStoreReader.fromBytes(stateData, await readBytes(output)).verify();
      logger.info("Stem index verified");
    }
  }
}

await runTool({
  toolClass: StemIndexTool,
  requiresRpc: false,
  parseOptions: (argv) => ({
    input: String(argv.input),
    output: String(argv.output),
    verify: argv.verify === true,
  }),
  yargsOptions: {
    input: {
      type: "string",
      description: "Input state.bin file",
      demandOption: true,
    },
    output: {
      type: "string",
      description: "Output stem-index.bin file",
      demandOption: true,
    },
    verify: {
      type: "boolean",
      default: false,
      description: "Verify the stem index after generation",
    },
  },
});
