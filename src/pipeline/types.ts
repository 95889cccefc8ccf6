export interface ChunkWindow {
  chunkIndex: number;
  startMs: number;
  endMs: number;
}

export interface ChunkInfo extends ChunkWindow {
  path: string;
}

export interface ChunkManifest {
  sourcePath: string;
  workDir: string;
  durationMs: number;
  chunkMs: number;
  chunks: ChunkInfo[];
}

export interface TranscriptFragment {
  chunkIndex: number;
  text: string;
  ok: boolean;
  error?: string;
}

export interface RecognitionSettings {
  languageCode: string;
  autoPunctuation: boolean;
  sampleRateHz: number;
}
