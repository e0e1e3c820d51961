/** Seconds, fractional allowed. */
export type Seconds = number;

export type RawCaptionRow = {
  text: string;
  offset: number;
  duration: number;
};

export type CaptionCue = {
  text: string;
  startOffset: Seconds;
  duration: Seconds;
};

export type TranscriptChunk = {
  text: string;
  startTime: Seconds;
  endTime: Seconds;
  index: number;
};

export type VideoMetadata = {
  title: string;
  channel: string;
  duration: Seconds;
};

export type VideoExtraction = {
  videoId: string;
  metadata: VideoMetadata;
  captions: CaptionCue[];
};

export type FetchCaptionsOptions = {
  signal?: AbortSignal;
};

export interface CaptionSource {
  fetchCaptions(videoId: string, options?: FetchCaptionsOptions): Promise<VideoExtraction>;
}
