import { getValue, parseArgs, parsePositiveInt } from './args'
import { UsageError } from '../errors'

describe('parseArgs', () => {
  it('should separate positionals from options', () => {
    const parsed = parseArgs(['src', '--output_csv', 'out.csv', 'dest'], { values: ['--output_csv'] })

    expect(parsed.positionals).toEqual(['src', 'dest'])
    expect(parsed.values.get('--output_csv')).toBe('out.csv')
  })

  it('should accept --name=value', () => {
    const parsed = parseArgs(['--concurrency=4'], { values: ['--concurrency'] })

    expect(parsed.values.get('--concurrency')).toBe('4')
  })

  it('should record flags', () => {
    const parsed = parseArgs(['-q', 'dir'], { flags: ['--quiet', '-q'] })

    expect(parsed.flags.has('-q')).toBe(true)
    expect(parsed.positionals).toEqual(['dir'])
  })

  it('should treat everything after -- as positional', () => {
    const parsed = parseArgs(['--', '--not-an-option', '-'], { flags: ['-q'] })

    expect(parsed.positionals).toEqual(['--not-an-option', '-'])
  })

  it('should reject an option without its value', () => {
    expect(() => parseArgs(['--output_csv'], { values: ['--output_csv'] })).toThrow(
      new UsageError('Option --output_csv requires a value')
    )
    expect(() => parseArgs(['--output_csv='], { values: ['--output_csv'] })).toThrow(
      'Option --output_csv requires a value'
    )
  })

  it('should reject unknown options', () => {
    expect(() => parseArgs(['--verbose'])).toThrow('Unknown option: --verbose')
    expect(() => parseArgs(['-q=1'], { flags: ['-q'] })).toThrow('Unknown option: -q=1')
  })

  it('should return the first value among aliases', () => {
    const parsed = parseArgs(['--output-csv', 'b.csv'], { values: ['--output_csv', '--output-csv'] })

    expect(getValue(parsed, '--output_csv', '--output-csv')).toBe('b.csv')
    expect(getValue(parsed, '--missing')).toBeUndefined()
  })
})

describe('parsePositiveInt', () => {
  it('should parse positive integers', () => {
    expect(parsePositiveInt('--concurrency', '12')).toBe(12)
  })

  it.each(['0', '-1', '1.5', 'abc', ''])('should reject %j', (value) => {
    expect(() => parsePositiveInt('--concurrency', value)).toThrow(
      `--concurrency must be a positive integer, got "${value}"`
    )
  })
})
