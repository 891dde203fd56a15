export interface OutputSink {
  log(text: string): void;
  error(text: string): void;
}

export const consoleSink: OutputSink = {
  log: (text) => console.log(text),
  error: (text) => console.error(text),
};
