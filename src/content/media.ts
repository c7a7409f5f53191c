import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import axios, { type AxiosAdapter, type AxiosInstance } from "axios";
import { TransientError } from "../core/errors";

export interface MediaAssetSpec {
  prompt: string;
  aspectRatio: string;
}

export interface MediaGenerator {
  /** Resolves to the URL of the generated asset. */
  generateAsset(spec: MediaAssetSpec, signal?: AbortSignal): Promise<string>;
}

const PredictionSchema = Type.Object({
  status: Type.String(),
  output: Type.Optional(
    Type.Union([Type.String(), Type.Array(Type.String()), Type.Null()]),
  ),
  error: Type.Optional(Type.Union([Type.String(), Type.Null()])),
});

export interface ReplicateOptions {
  url: string;
  apiKey?: string;
  model: string;
  adapter?: AxiosAdapter;
}

/** One synchronous prediction per asset (`Prefer: wait`). */
export class ReplicateMediaGenerator implements MediaGenerator {
  private readonly http: AxiosInstance;

  constructor(private readonly options: ReplicateOptions) {
    this.http = axios.create({
      baseURL: options.url,
      timeout: 120_000,
      headers: {
        "Content-Type": "application/json",
        Prefer: "wait",
        ...(options.apiKey ? { Authorization: `Bearer ${options.apiKey}` } : {}),
      },
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  async generateAsset(
    spec: MediaAssetSpec,
    signal?: AbortSignal,
  ): Promise<string> {
    const response = await this.http.post<unknown>(
      `/v1/models/${this.options.model}/predictions`,
      {
        input: {
          prompt: spec.prompt,
          aspect_ratio: spec.aspectRatio,
          output_format: "webp",
        },
      },
      { signal },
    );

    const prediction = response.data;
    if (!Value.Check(PredictionSchema, prediction)) {
      throw new TransientError("media provider returned an unexpected payload");
    }
    if (prediction.status !== "succeeded") {
      throw new TransientError(
        `media prediction ${prediction.status}: ${prediction.error ?? "no output"}`,
      );
    }

    const output = Array.isArray(prediction.output)
      ? prediction.output[0]
      : prediction.output;
    if (!output) {
      throw new TransientError("media prediction succeeded without output");
    }
    return output;
  }
}
