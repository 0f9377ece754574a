export * from './types/playlist.types';
export * from './types/video.types';
export * from './types/device.types';
export * from './types/changelog.types';
export * from './types/download.types';
