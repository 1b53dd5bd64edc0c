/** Destination of formatted output. */
export interface OutputSink {
  write(text: string): void
}

export const createStdoutSink = (): OutputSink => ({
  write(text) {
    process.stdout.write(text)
  },
})

/** Keeps everything written, for tests and for embedding. */
export class MemoryOutputSink implements OutputSink {
  private readonly chunks: string[] = []

  write(text: string): void {
    this.chunks.push(text)
  }

  get text(): string {
    return this.chunks.join('')
  }

  get lines(): string[] {
    return this.text.split('\n')
  }
}
