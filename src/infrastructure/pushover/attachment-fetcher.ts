import type { Logger } from 'pino';
import { ImageAttachment } from './attachment.js';

/** Pushover rejects attachments above 2.5 MB. */
export const MAX_ATTACHMENT_BYTES = 2_621_440;

const SUPPORTED_IMAGE_TYPE = /^image\/(jpeg|png|gif)$/i;

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Resolves a rendered `image_url` into an attachment, or null.
 *
 * Checks run in order: download, size, type. The whole body is read here
 * and the size limit applies to the downloaded bytes, not the declared
 * Content-Length. Every failure is logged and
 * degrades to "no attachment"; a rejected handle is closed before
 * returning. Never throws.
 */
export async function fetchAttachment(
  imageUrl: string | undefined,
  log: Logger,
): Promise<ImageAttachment | null> {
  if (imageUrl === undefined || imageUrl.trim() === '') return null;

  let attachment: ImageAttachment;
  try {
    attachment = await ImageAttachment.open(imageUrl);
  } catch (err: unknown) {
    log.warn({ err, image_url: imageUrl }, `Failed to download image from '${imageUrl}': ${errorMessage(err)}`);
    return null;
  }

  try {
    const declared = attachment.declaredSize;
    if (
      (declared !== null && declared > MAX_ATTACHMENT_BYTES) ||
      (await attachment.size()) > MAX_ATTACHMENT_BYTES
    ) {
      log.warn({ image_url: imageUrl }, `Image size exceeds 2.5 MB limit for '${imageUrl}'. Skipping attachment.`);
      await attachment.close();
      return null;
    }
  } catch (err: unknown) {
    log.warn({ err, image_url: imageUrl }, `Failed to download image from '${imageUrl}': ${errorMessage(err)}`);
    await attachment.close();
    return null;
  }

  if (!SUPPORTED_IMAGE_TYPE.test(attachment.contentType)) {
    log.warn(
      { image_url: imageUrl, content_type: attachment.contentType },
      `Unsupported image type '${attachment.contentType}' for '${imageUrl}'. Skipping attachment.`,
    );
    await attachment.close();
    return null;
  }

  return attachment;
}
