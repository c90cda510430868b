import {
  RekognitionClient,
  CompareFacesCommand,
  DetectFacesCommand,
  type CompareFacesCommandInput,
  type CompareFacesCommandOutput,
  type DetectFacesCommandInput,
  type DetectFacesCommandOutput,
  type FaceDetail,
} from "@aws-sdk/client-rekognition";
import Bottleneck from "bottleneck";
import sharp from "sharp";
import type { BoundingBox, FaceEngine, FaceRegion } from "./types";
import { InvalidImageFormatError, errorMessage } from "../errors";
import { createLogger, type Logger } from "../logger";
import type { Config } from "../config";

/** Share of the face box added on each side when cropping. */
export const CROP_MARGIN = 0.25;
/** Longest side of a face crop; small faces are enlarged to it. */
export const CROP_SIZE = 320;

/** The face, cut out of its photo, as Rekognition will compare it. */
export interface FaceCrop {
  readonly bytes: Buffer;
}

/** The Rekognition calls the engine makes; lets tests stand in for AWS. */
export interface RekognitionApi {
  detectFaces(input: DetectFacesCommandInput): Promise<DetectFacesCommandOutput>;
  compareFaces(input: CompareFacesCommandInput): Promise<CompareFacesCommandOutput>;
}

export function rekognitionApi(client: RekognitionClient): RekognitionApi {
  return {
    detectFaces: (input) => client.send(new DetectFacesCommand(input)),
    compareFaces: (input) => client.send(new CompareFacesCommand(input)),
  };
}

export interface PixelArea {
  left: number;
  top: number;
  width: number;
  height: number;
}

/**
 * Pixel rectangle of a relative face box widened by `margin`, clipped to
 * the image. Null when nothing of the box lies inside the image.
 */
export function cropArea(
  box: BoundingBox,
  imageWidth: number,
  imageHeight: number,
  margin: number = CROP_MARGIN
): PixelArea | null {
  const left = Math.max(0, Math.floor((box.left - box.width * margin) * imageWidth));
  const top = Math.max(0, Math.floor((box.top - box.height * margin) * imageHeight));
  const right = Math.min(imageWidth, Math.ceil((box.left + box.width * (1 + margin)) * imageWidth));
  const bottom = Math.min(imageHeight, Math.ceil((box.top + box.height * (1 + margin)) * imageHeight));

  if (right - left < 1 || bottom - top < 1) return null;
  return { left, top, width: right - left, height: bottom - top };
}

function isAwsError(error: unknown, name: string): error is Error {
  return error instanceof Error && error.name === name;
}

/**
 * Faces are found with DetectFaces, cut out of the photo, and compared
 * pairwise with CompareFaces: distance = 1 - similarity / 100.
 */
export class RekognitionFaceEngine implements FaceEngine<FaceCrop> {
  readonly name = "rekognition";
  private api: RekognitionApi;
  private limiter: Bottleneck;
  private minFaceConfidence: number;
  private requestTimeoutMs: number;
  private imageProcessing: Config["imageProcessing"];
  private log: Logger;

  constructor(config: Config, api?: RekognitionApi, log: Logger = createLogger("rekognition")) {
    this.api = api ?? rekognitionApi(new RekognitionClient({ region: config.aws.region }));
    this.minFaceConfidence = config.rekognition.minFaceConfidence;
    this.requestTimeoutMs = config.rekognition.requestTimeoutMs;
    this.imageProcessing = config.imageProcessing;
    this.log = log;

    this.limiter = new Bottleneck({
      minTime: config.rekognition.rateLimit.minTime,
      maxConcurrent: config.rekognition.rateLimit.maxConcurrent,
    });
  }

  async detectFaces(image: Buffer): Promise<FaceRegion[]> {
    const imageBytes = await this.prepareImage(image);

    let response: DetectFacesCommandOutput;
    try {
      response = await this.schedule(() =>
        this.api.detectFaces({ Image: { Bytes: imageBytes }, Attributes: ["DEFAULT"] })
      );
    } catch (error) {
      if (isAwsError(error, "InvalidImageFormatException")) {
        throw new InvalidImageFormatError(`Rekognition rejected the image: ${error.message}`, { cause: error });
      }
      throw error;
    }

    const faces: FaceRegion[] = [];
    for (const detail of response.FaceDetails ?? []) {
      const confidence = detail.Confidence ?? 0;
      if (confidence < this.minFaceConfidence) {
        this.log.debug({ confidence, minFaceConfidence: this.minFaceConfidence }, "Dropping low confidence face");
        continue;
      }
      faces.push(this.convertFace(detail));
    }

    this.log.debug({ faceCount: faces.length, rawCount: response.FaceDetails?.length ?? 0 }, "Faces detected");
    return faces;
  }

  /** Crop the face (with some margin) out of the upright image. */
  async embed(image: Buffer, region: FaceRegion): Promise<FaceCrop> {
    const metadata = await this.readMetadata(image);
    const quarterTurn = (metadata.orientation ?? 1) >= 5;
    const width = (quarterTurn ? metadata.height : metadata.width) ?? 0;
    const height = (quarterTurn ? metadata.width : metadata.height) ?? 0;

    const area = cropArea(region.boundingBox, width, height);
    if (!area) {
      throw new Error("Face region lies outside the image");
    }

    const bytes = await sharp(image)
      .rotate()
      .extract(area)
      .resize(CROP_SIZE, CROP_SIZE, { fit: "inside" })
      .jpeg({ quality: this.imageProcessing.jpegQuality })
      .toBuffer();
    return { bytes };
  }

  /**
   * Compare the face in `a` with the face in `b`. A crop in which
   * Rekognition finds no face is as far away as possible.
   */
  async distance(a: FaceCrop, b: FaceCrop): Promise<number> {
    let response: CompareFacesCommandOutput;
    try {
      response = await this.schedule(() =>
        this.api.compareFaces({
          SourceImage: { Bytes: a.bytes },
          TargetImage: { Bytes: b.bytes },
          SimilarityThreshold: 0,
        })
      );
    } catch (error) {
      if (isAwsError(error, "InvalidParameterException")) {
        this.log.debug({ error: error.message }, "No comparable face in crop");
        return 1;
      }
      if (isAwsError(error, "InvalidImageFormatException")) {
        throw new InvalidImageFormatError(`Rekognition rejected a face crop: ${error.message}`, { cause: error });
      }
      throw error;
    }

    let similarity = 0;
    for (const match of response.FaceMatches ?? []) {
      similarity = Math.max(similarity, match.Similarity ?? 0);
    }
    return 1 - similarity / 100;
  }

  /**
   * Rate limited call. Jobs that outlive requestTimeoutMs are failed so a
   * hung request gives its slot back.
   */
  private schedule<T>(request: () => Promise<T>): Promise<T> {
    return this.limiter.schedule({ expiration: this.requestTimeoutMs }, request);
  }

  private async readMetadata(image: Buffer): Promise<sharp.Metadata> {
    try {
      return await sharp(image).metadata();
    } catch (error) {
      throw new InvalidImageFormatError(`Cannot decode image: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Hand Rekognition upright JPEG or PNG bytes no larger than maxDimension.
   * Anything sharp cannot decode is an invalid image.
   */
  private async prepareImage(image: Buffer): Promise<Buffer> {
    const { maxDimension, jpegQuality } = this.imageProcessing;
    const metadata = await this.readMetadata(image);

    this.log.debug(
      { format: metadata.format, width: metadata.width, height: metadata.height, size: image.length },
      "Preparing image"
    );

    const tooLarge = (metadata.width ?? 0) > maxDimension || (metadata.height ?? 0) > maxDimension;
    const accepted = metadata.format === "jpeg" || metadata.format === "png";
    const upright = (metadata.orientation ?? 1) === 1;
    if (!tooLarge && accepted && upright) {
      return image;
    }

    let pipeline = sharp(image).rotate();
    if (tooLarge) {
      this.log.debug({ maxDimension }, "Resizing large image");
      pipeline = pipeline.resize(maxDimension, maxDimension, { fit: "inside" });
    }
    return await pipeline.jpeg({ quality: jpegQuality }).toBuffer();
  }

  private convertFace(detail: FaceDetail): FaceRegion {
    return {
      boundingBox: this.convertBoundingBox(detail.BoundingBox),
      confidence: detail.Confidence ?? 0,
    };
  }

  private convertBoundingBox(box?: {
    Width?: number;
    Height?: number;
    Left?: number;
    Top?: number;
  }): BoundingBox {
    return {
      width: box?.Width ?? 0,
      height: box?.Height ?? 0,
      left: box?.Left ?? 0,
      top: box?.Top ?? 0,
    };
  }
}
