// Tests for matrix file loading and saving
import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import {
  listMatrixFiles,
  readMatrixFile,
  readMatrixFileWithReport,
  writeMatrixFile,
  writeMatrixJson
} from '../matrix-files'
import { calculatorLogs } from '../../calculator/calculator-logger'
import { FormatError } from '../../calculator/sparse/errors'
import { SparseMatrix } from '../../calculator/sparse/SparseMatrix'

describe('matrix-files', () => {
  let dir: string

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sparse-calc-'))
  })

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true })
  })

  it('reads a matrix file', () => {
    const file = path.join(dir, 'a.txt')
    fs.writeFileSync(file, 'rows=2\ncols=2\n(0, 1, 3)\n')

    const m = readMatrixFile(file)
    expect(m.get(0, 1)).toBe(3)
    expect(calculatorLogs).toContain('Loaded a.txt: 2x2 with 1 non-zero elements')
  })

  it('returns the parse report with the matrix', () => {
    const file = path.join(dir, 'b.txt')
    fs.writeFileSync(file, 'rows=1\ncols=1\n(0, 0, 1)\n(0, 1, 2)\n')

    const { matrix, report } = readMatrixFileWithReport(file)
    expect(matrix.nonZeroCount).toBe(1)
    expect(report.skippedEntries).toBe(1)
  })

  it('throws FormatError for a missing file', () => {
    const file = path.join(dir, 'missing.txt')
    expect(() => readMatrixFile(file)).toThrow(FormatError)
    expect(() => readMatrixFile(file)).toThrow(`File not found: ${file}`)
  })

  it('throws FormatError when the path is a directory', () => {
    expect(() => readMatrixFile(dir)).toThrow(FormatError)
  })

  it('propagates parse errors', () => {
    const file = path.join(dir, 'bad.txt')
    fs.writeFileSync(file, 'rows=2\ncols=2\n(1,1)\n')
    expect(() => readMatrixFile(file)).toThrow('Line 3: Expected "(row, col, value)", got "(1,1)"')
  })

  it('writes text that reads back to the same matrix', () => {
    const m = SparseMatrix.fromDense([
      [0, 1.5],
      [-2, 0]
    ])
    const file = path.join(dir, 'out.txt')

    writeMatrixFile(m, file)

    expect(fs.readFileSync(file, 'utf-8')).toBe('rows=2\ncols=2\n(0, 1, 1.5)\n(1, 0, -2)\n')
    expect(readMatrixFile(file).equals(m)).toBe(true)
  })

  it('writes JSON', () => {
    const m = SparseMatrix.fromDense([[0, 4]])
    const file = path.join(dir, 'out.json')

    writeMatrixJson(m, file)

    expect(JSON.parse(fs.readFileSync(file, 'utf-8'))).toEqual({
      rows: 1,
      cols: 2,
      entries: [{ row: 0, col: 1, value: 4 }]
    })
  })

  describe('listMatrixFiles', () => {
    it('lists .txt files sorted by name', () => {
      fs.writeFileSync(path.join(dir, 'b.txt'), '')
      fs.writeFileSync(path.join(dir, 'a.txt'), '')
      fs.writeFileSync(path.join(dir, 'notes.md'), '')
      fs.mkdirSync(path.join(dir, 'nested.txt'))

      expect(listMatrixFiles(dir)).toEqual([path.join(dir, 'a.txt'), path.join(dir, 'b.txt')])
    })

    it('returns an empty list for a folder without matrices', () => {
      expect(listMatrixFiles(dir)).toEqual([])
      expect(listMatrixFiles(path.join(dir, 'absent'))).toEqual([])
    })
  })
})
