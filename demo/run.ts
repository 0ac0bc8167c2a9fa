import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "url";
import { addJpegArtifacts, encodePng, meanAbsoluteError, psnr, readImage, referenceJpegRoundTrip } from "../src";
import { testCard } from "../test/fixtures";

const outDir = path.join(path.dirname(fileURLToPath(import.meta.url)), "out");

async function main(): Promise<void> {
  fs.mkdirSync(outDir, { recursive: true });

  const card = testCard(256, 192);
  const original = encodePng(card);
  fs.writeFileSync(path.join(outDir, "original.png"), original);

  for (const strength of [0, 0.25, 0.5, 0.75, 1]) {
    const { image } = await addJpegArtifacts(original, { strength, verbose: true });
    const file = path.join(outDir, `strength-${strength.toFixed(2)}.png`);
    fs.writeFileSync(file, image);

    const degraded = await readImage(image);
    console.log(
      `  ${path.basename(file)}  mae=${meanAbsoluteError(degraded, card).toFixed(2)}  psnr=${psnr(degraded, card).toFixed(2)} dB`
    );
  }

  for (const quality of [90, 50, 10]) {
    const reference = referenceJpegRoundTrip(card, quality);
    const file = path.join(outDir, `reference-q${quality}.png`);
    fs.writeFileSync(file, encodePng(reference));
    console.log(
      `  ${path.basename(file)}  mae=${meanAbsoluteError(reference, card).toFixed(2)}  psnr=${psnr(reference, card).toFixed(2)} dB`
    );
  }
}

main().catch((err) => {
  console.error("demo failed:", err);
  process.exit(1);
});
