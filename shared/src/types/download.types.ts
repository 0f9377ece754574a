export interface DownloadProgress {
  completed: number;
  total: number;
  percent: number;
}

export interface DownloadFailure {
  videoId: string;
  error: string;
}

export interface DownloadSummary {
  total: number;
  completed: number;
  succeeded: string[];
  failed: DownloadFailure[];
  cancelled: boolean;
}
