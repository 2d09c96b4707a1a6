/**
 * Print a summary of every interval in a BIF6 file
 *
 * Usage: basic-usage <file.bif6>
 */

import { Bif6Error, Bif6Parser, Bif6Utils } from "../src";

async function main(filePath: string): Promise<void> {
  const parser = new Bif6Parser();
  const header = await parser.readHeader(filePath);
  console.log(`${filePath}: ${header.intervalCount} intervals, ${header.width}x${header.height} px`);

  for await (const interval of parser.parseFile(filePath)) {
    const stats = Bif6Utils.imageStatistics(interval);
    const label = interval.isTicImage() ? "TIC" : `#${interval.id}`;
    console.log(
      `${label}\tm/z ${interval.mzLower.toFixed(4)}-${interval.mzUpper.toFixed(4)}\tmax ${stats.max}\tsum ${stats.sum}`
    );
  }
}

const filePath = process.argv[2];
if (filePath === undefined) {
  console.error("Usage: basic-usage <file.bif6>");
  process.exit(1);
}

main(filePath).catch((error: unknown) => {
  console.error(error instanceof Bif6Error ? error.toString() : error);
  process.exit(1);
});
