import multer from "multer";

/** Multipart parser keeping the single `image` field in memory for the image store. */
export function imageUpload(maxBytes: number) {
  return multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxBytes, files: 1 },
  }).single("image");
}
