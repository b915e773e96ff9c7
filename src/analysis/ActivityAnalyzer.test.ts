import { describe, it, expect, vi } from 'vitest'
import { ActivityAnalyzer, rankCounts } from './ActivityAnalyzer'
import { ContentClassifier } from '../classification/ContentClassifier'
import { Classification, ClassificationUnavailableError, InvalidRecordError } from '../contracts'
import { contentTypeForExtension } from '../classification/KeywordContentClassifier'

const repeat = (path: string, times: number): string[] => Array.from({ length: times }, () => path)

class ExtensionClassifier implements ContentClassifier {
  calls: string[] = []

  constructor(private failing: Set<string> = new Set()) {}

  async classify(path: string): Promise<Classification> {
    this.calls.push(path)
    if (this.failing.has(path)) {
      throw new ClassificationUnavailableError(path, 'content fetch failed')
    }
    const extension = path.slice(path.lastIndexOf('.') + 1)
    return {
      contentType: contentTypeForExtension(extension),
      keywords: [extension],
      topics: ['general'],
      summary: `contents of ${path}`,
    }
  }
}

describe('ActivityAnalyzer', () => {
  describe('ranking', () => {
    it('should keep the two tied leaders and the next directory for K=3', async () => {
      const paths = [
        ...repeat('beta/b.txt', 5),
        ...repeat('alpha/a.txt', 5),
        ...repeat('gamma/c.txt', 4),
        ...repeat('delta/d.txt', 3),
        ...repeat('epsilon/e.txt', 2),
        ...repeat('zeta/f.txt', 1),
      ]
      const pattern = await new ActivityAnalyzer({ topK: 3 }).analyze(paths)

      expect(pattern.topDirectories).toEqual([
        { key: 'alpha', count: 5 },
        { key: 'beta', count: 5 },
        { key: 'gamma', count: 4 },
      ])
    })

    it('should rank file types including the empty extension bucket', async () => {
      const pattern = await new ActivityAnalyzer().analyze([
        'README',
        'docs/a.md',
        'docs/b.MD',
        'LICENSE',
        'src/index.ts',
        'Makefile',
      ])

      expect(pattern.topFileTypes).toEqual([
        { key: '', count: 3 },
        { key: 'md', count: 2 },
        { key: 'ts', count: 1 },
      ])
      expect(pattern.topDirectories).toEqual([
        { key: '.', count: 3 },
        { key: 'docs', count: 2 },
        { key: 'src', count: 1 },
      ])
    })

    it('should produce identical rankings on repeated runs', async () => {
      const paths = ['x/1.a', 'y/2.b', 'z/3.c', 'y/4.a', 'x/5.b', 'z/6.c']
      const analyzer = new ActivityAnalyzer({ topK: 2 })

      const first = await analyzer.analyze(paths)
      const second = await analyzer.analyze(paths)

      expect(second.topDirectories).toEqual(first.topDirectories)
      expect(second.topFileTypes).toEqual(first.topFileTypes)
      expect(first.topDirectories).toEqual([
        { key: 'x', count: 2 },
        { key: 'y', count: 2 },
      ])
    })
  })

  describe('totals', () => {
    it('should count duplicates as separate occurrences', async () => {
      const pattern = await new ActivityAnalyzer().analyze(['a/x.txt', 'a/x.txt', 'b/y.txt'])
      expect(pattern.totalChanges).toBe(3)
      expect(pattern.records.map(r => r.path)).toEqual(['a/x.txt', 'a/x.txt', 'b/y.txt'])
    })

    it('should return an empty pattern for empty input', async () => {
      const pattern = await new ActivityAnalyzer().analyze([])
      expect(pattern.totalChanges).toBe(0)
      expect(pattern.topDirectories).toEqual([])
      expect(pattern.topFileTypes).toEqual([])
      expect(pattern.contentCounts).toEqual({ document: 0, code: 0, data: 0, unknown: 0 })
    })
  })

  describe('classification', () => {
    it('should tolerate a single classification failure', async () => {
      const paths = [
        'docs/1.md', 'docs/2.md', 'docs/3.md', 'src/4.ts', 'src/5.ts',
        'data/6.csv', 'data/7.csv', 'misc/8.bin', 'docs/9.md', 'src/10.ts',
      ]
      const classifier = new ExtensionClassifier(new Set(['data/7.csv']))
      const pattern = await new ActivityAnalyzer({ classifier }).analyze(paths)

      expect(pattern.totalChanges).toBe(10)
      expect(pattern.classifiedRecords).toHaveLength(9)
      expect(pattern.classifiedRecords.map(r => r.path)).not.toContain('data/7.csv')
      expect(pattern.classificationFailures).toEqual([
        { path: 'data/7.csv', reason: 'content fetch failed' },
      ])
      expect(pattern.contentCounts).toEqual({ document: 4, code: 3, data: 1, unknown: 1 })
      expect(pattern.topDirectories[0]).toEqual({ key: 'docs', count: 4 })
    })

    it('should preserve input order of classified records', async () => {
      const classifier: ContentClassifier = {
        classify: async (path: string) => {
          // Later paths resolve first
          await new Promise(resolve => setTimeout(resolve, path === 'a/1.md' ? 20 : 0))
          return { contentType: 'document', keywords: [], topics: [], summary: '' }
        },
      }
      const pattern = await new ActivityAnalyzer({ classifier }).analyze(['a/1.md', 'b/2.md', 'c/3.md'])
      expect(pattern.classifiedRecords.map(r => r.path)).toEqual(['a/1.md', 'b/2.md', 'c/3.md'])
    })

    it('should cap concurrent classifications', async () => {
      let active = 0
      let peak = 0
      const classifier: ContentClassifier = {
        classify: async () => {
          active++
          peak = Math.max(peak, active)
          await new Promise(resolve => setTimeout(resolve, 5))
          active--
          return { contentType: 'data', keywords: [], topics: [], summary: '' }
        },
      }

      const paths = Array.from({ length: 8 }, (_, i) => `d/${i}.json`)
      const pattern = await new ActivityAnalyzer({ classifier, concurrency: 2 }).analyze(paths)

      expect(peak).toBe(2)
      expect(pattern.contentCounts.data).toBe(8)
    })

    it('should count deletions without classifying them', async () => {
      const classifier = new ExtensionClassifier()

      const pattern = await new ActivityAnalyzer({ classifier }).analyze([
        { path: '/docs/a.md', serverModified: '2026-03-10T11:00:00Z', size: 120 },
        { path: '/docs/old.md', serverModified: '2026-03-10T12:00:00Z', deleted: true },
      ])

      expect(classifier.calls).toEqual(['docs/a.md'])
      expect(pattern.totalChanges).toBe(2)
      expect(pattern.topDirectories).toEqual([{ key: 'docs', count: 2 }])
      expect(pattern.records.map(record => record.deleted)).toEqual([false, true])
      expect(pattern.classificationFailures).toEqual([])
    })

    it('should reject malformed paths before classifying anything', async () => {
      const classifier = new ExtensionClassifier()
      const classify = vi.spyOn(classifier, 'classify')

      await expect(
        new ActivityAnalyzer({ classifier }).analyze(['docs/a.md', '   ', 'docs/b.md'])
      ).rejects.toBeInstanceOf(InvalidRecordError)
      expect(classify).not.toHaveBeenCalled()
    })
  })
})

describe('rankCounts', () => {
  it('should order by count then key and truncate', () => {
    const counts = new Map([['b', 2], ['a', 2], ['c', 3], ['d', 1]])
    expect(rankCounts(counts, 3)).toEqual([
      { key: 'c', count: 3 },
      { key: 'a', count: 2 },
      { key: 'b', count: 2 },
    ])
    expect(rankCounts(counts, 0)).toEqual([])
  })
})
