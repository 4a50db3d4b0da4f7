import { TerminalProgressReporter } from './ProgressReporter'

const createStream = (isTTY: boolean) => {
  const chunks: string[] = []
  return {
    chunks,
    stream: {
      isTTY,
      write: (chunk: string) => {
        chunks.push(chunk)
        return true
      },
    },
  }
}

describe('TerminalProgressReporter', () => {
  it('should redraw the count on a terminal', () => {
    const { chunks, stream } = createStream(true)
    const reporter = new TerminalProgressReporter(stream)

    reporter.start(3)
    reporter.advance({ relativePath: 'a', digest: 'abc' })
    reporter.advance({ relativePath: 'b' })
    reporter.finish()

    expect(chunks).toEqual([
      '\rComputing checksums: 0/3 files',
      '\rComputing checksums: 1/3 files',
      '\rComputing checksums: 2/3 files (1 failed)',
      '\n',
    ])
  })

  it('should write nothing when the stream is not a terminal', () => {
    const { chunks, stream } = createStream(false)
    const reporter = new TerminalProgressReporter(stream)

    reporter.start(1)
    reporter.advance({ relativePath: 'a', digest: 'abc' })
    reporter.finish()

    expect(chunks).toEqual([])
  })
})
