// youtube-captions-scraper ships no type declarations and has no @types package.
declare module 'youtube-captions-scraper' {
  export interface Subtitle {
    start: string;
    dur: string;
    text: string;
  }

  export function getSubtitles(options: { videoID: string; lang?: string }): Promise<Subtitle[]>;
}
