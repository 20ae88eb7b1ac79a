import type { SegmentSource, VerifyMode } from "../types.js";
import type { TargetContext } from "./context.js";
import { classifyImage, verifySpans } from "./program.js";

// Compare an image against the device without erasing or writing
export async function verify(ctx: TargetContext, image: SegmentSource, mode: VerifyMode): Promise<void> {
  const spans = await classifyImage(ctx, image);
  if (mode === "NONE") {
    return;
  }
  ctx.logger.progress("verify");
  await verifySpans(ctx, spans, mode);
  ctx.logger.log("info", `Verified ${spans.length} spans.`);
}
