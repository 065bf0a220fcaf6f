import type { Context } from "telegraf";

/**
 * Downloads a photo from Telegram and returns it as a base64 data URL,
 * ready to be sent as an image part to the AI service.
 */
export async function downloadPhotoAsDataUrl(ctx: Context, fileId: string): Promise<string> {
  const url = await ctx.telegram.getFileLink(fileId);
  const response = await fetch(url.href);

  if (!response.ok) {
    throw new Error(`Failed to download photo: ${response.status} ${response.statusText}`);
  }

  const buffer = Buffer.from(await response.arrayBuffer());

  // Telegram serves photos as JPEG; documents sent as photos keep their extension
  const urlPath = url.pathname.toLowerCase();
  let mimeType = "image/jpeg";
  if (urlPath.endsWith(".png")) {
    mimeType = "image/png";
  } else if (urlPath.endsWith(".webp")) {
    mimeType = "image/webp";
  }

  return `data:${mimeType};base64,${buffer.toString("base64")}`;
}
