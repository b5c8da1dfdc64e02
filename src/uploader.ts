// Upload Delegate - Hands the finished workbook to object storage
import { basename } from 'path';
import { toError } from './errors.js';
import type { ObjectUploader, UploadResult } from './types.js';

/**
 * Build the gs:// URI of an object.
 */
export function gcsUri(bucket: string, destination: string): string {
  return `gs://${bucket}/${destination}`;
}

/**
 * Upload a local file to a bucket.
 *
 * Without a bucket nothing is uploaded and the result is `skipped`.
 * A failed upload is returned as `failed`; this function does not throw.
 *
 * @param destination - Object name (default: the file's base name)
 */
export async function uploadInventory(
  uploader: ObjectUploader,
  localFile: string,
  bucket?: string,
  destination?: string
): Promise<UploadResult> {
  if (!bucket) {
    console.log('[Uploader] No bucket provided, skipping upload.');
    return { status: 'skipped', reason: 'no bucket configured' };
  }

  const objectName = destination || basename(localFile);
  const uri = gcsUri(bucket, objectName);

  console.log(`[Uploader] Uploading ${localFile} to ${uri}`);
  try {
    await uploader.upload(localFile, bucket, objectName);
  } catch (error) {
    const err = toError(error);
    console.error(`[Uploader] Upload failed: ${err.message}`);
    return { status: 'failed', uri, error: err };
  }

  console.log('[Uploader] Upload successful');
  return { status: 'uploaded', uri };
}
