import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import type { PreviewConfig } from '../../src/lib/config'
import { runInjectMetadata, runPreview } from '../../src/lib/pipeline'
import type { PreviewLogger } from '../../src/lib/pipeline'
import { DirectoryPriorVersionSource } from '../../src/lib/prior'
import type { PriorVersionSource } from '../../src/lib/prior'
import { DEFAULT_THRESHOLDS } from '../../src/lib/types'

const site = (main: string) =>
  '<html><head><title>t</title></head><body>' +
  '<nav id="TOC"><a href="index.html">Home</a><a href="01-intro.html">Intro</a><a href="02-methods.html">Methods</a></nav>' +
  `<main>${main}</main></body></html>`

const introHeading = '<h1><span class="chapter-number">1</span> <span class="chapter-title">Intro</span></h1>'

const captureLogger = () => {
  const info: string[] = []
  const error: string[] = []
  const logger: PreviewLogger = { info: (l) => info.push(l), error: (l) => error.push(l) }
  return { logger, info, error }
}

describe('runPreview', () => {
  let root = ''
  let siteDir = ''
  let baseDir = ''

  const config = (changedFiles: string[]): PreviewConfig => ({
    htmlDir: siteDir,
    changedFiles,
    prior: { kind: 'none' },
    thresholds: DEFAULT_THRESHOLDS,
    similarity: 'sequence',
    strict: false
  })

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'preview-'))
    siteDir = path.join(root, 'site')
    baseDir = path.join(root, 'base')
    await fs.mkdir(siteDir)
    await fs.mkdir(baseDir)
    await fs.writeFile(path.join(siteDir, 'index.html'), site('<p>Welcome</p>'), 'utf8')
    await fs.writeFile(path.join(siteDir, '01-intro.html'), site(`${introHeading}<p>The quick brown fox jumps.</p>`), 'utf8')
    await fs.writeFile(path.join(siteDir, '02-methods.html'), site('<p>Methods</p>'), 'utf8')
    await fs.writeFile(path.join(baseDir, '01-intro.html'), site(`${introHeading}<p>The quick fox jumps.</p>`), 'utf8')
  })

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true })
  })

  it('highlights changed pages, the home banner and the navigation', async () => {
    const { logger, info, error } = captureLogger()
    const report = await runPreview(config(['01-intro.qmd', 'assets/site.css']), {
      prior: new DirectoryPriorVersionSource(baseDir),
      logger
    })

    expect(report.failed).toBe(0)
    expect(report.pages).toHaveLength(1)
    expect(report.pages[0].status).toBe('annotated')
    expect(report.pages[0].counts).toEqual({ unchanged: 1, modified: 1, added: 0 })
    expect(report.pages[0].similarity).toBeCloseTo(228 / 234, 6)
    expect(report.homeBanner).toBe(true)
    expect(report.tocUpdated).toEqual(['01-intro.html', '02-methods.html', 'index.html'])

    const intro = await fs.readFile(path.join(siteDir, '01-intro.html'), 'utf8')
    expect(intro).toContain('<p>The quick <span class="preview-added">brown</span> fox jumps.</p>')
    expect(intro).toContain('<style id="preview-highlight-styles">')
    expect(intro).toContain('<a href="01-intro.html" class="preview-toc-changed">Intro</a>')
    expect(intro).not.toContain('preview-content-changed-notice')

    const index = await fs.readFile(path.join(siteDir, 'index.html'), 'utf8')
    expect(index).toContain('<a href="01-intro.html">1. Intro</a>')
    expect(index).toContain('<a href="01-intro.html" class="preview-toc-changed">Intro</a>')

    expect(info).toEqual([
      `Comparing against directory ${baseDir}`,
      'Processing 01-intro.html...',
      '  Similarity to published version: 97.44%',
      '  Highlighted 1 modified and 0 added block(s); 1 unchanged',
      'Added home page banner with 1 changed chapter(s)',
      'Marked changed chapters in the navigation of 3 page(s)'
    ])
    expect(error).toEqual([])
  })

  it('marks everything as added when the prior version cannot be read', async () => {
    const failing: PriorVersionSource = {
      description: 'failing source',
      read: async () => {
        throw new Error('boom')
      }
    }
    const { logger, error } = captureLogger()
    const report = await runPreview(config(['01-intro.qmd']), { prior: failing, logger })

    expect(report.pages[0].counts).toEqual({ unchanged: 0, modified: 0, added: 2 })
    expect(report.pages[0].similarity).toBeNull()
    expect(error).toEqual(['  Could not read prior version of 01-intro.html: boom'])
    const intro = await fs.readFile(path.join(siteDir, '01-intro.html'), 'utf8')
    expect(intro).toContain('<p><span class="preview-added">The quick brown fox jumps.</span></p>')
  })

  it('keeps going after a page fails', async () => {
    await fs.mkdir(path.join(siteDir, '01-broken.html'))
    const { logger, error } = captureLogger()
    const report = await runPreview(config(['01-broken.qmd', '01-intro.qmd']), {
      prior: new DirectoryPriorVersionSource(baseDir),
      logger
    })

    expect(report.failed).toBe(1)
    expect(report.pages.map((p) => [p.id, p.status])).toEqual([
      ['01-broken', 'failed'],
      ['01-intro', 'annotated']
    ])
    expect(report.pages[0].error).toMatch(/EISDIR/)
    expect(error[0]).toMatch(/^ {2}Failed to process 01-broken\.html: /)
    expect(report.homeBanner).toBe(true)

    const intro = await fs.readFile(path.join(siteDir, '01-intro.html'), 'utf8')
    expect(intro).toContain('<p>The quick <span class="preview-added">brown</span> fox jumps.</p>')
    const index = await fs.readFile(path.join(siteDir, 'index.html'), 'utf8')
    expect(index).toContain('<a href="01-intro.html">1. Intro</a>')
    expect(index).not.toContain('01-broken.html')
  })

  it('skips changed documents without a rendered page', async () => {
    const { logger, info } = captureLogger()
    const report = await runPreview(config(['03-missing.qmd']), { prior: new DirectoryPriorVersionSource(baseDir), logger })

    expect(report).toEqual({
      pages: [{ id: '03-missing', path: '03-missing.html', status: 'missing' }],
      tocUpdated: [],
      homeBanner: false,
      failed: 0
    })
    expect(info).toContain('Skipping 03-missing.html: no rendered page')
  })

  it('does nothing without changed source files', async () => {
    const { logger, info } = captureLogger()
    const report = await runPreview(config(['README.txt']), { logger })
    expect(report.pages).toEqual([])
    expect(info).toEqual(['No changed files to process'])
  })
})

describe('runInjectMetadata', () => {
  let dir = ''

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'inject-'))
  })

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  it('marks existing source documents and reports missing ones', async () => {
    await fs.writeFile(path.join(dir, 'a.qmd'), 'Body\n', 'utf8')
    await fs.writeFile(path.join(dir, 'style.css'), 'p{}', 'utf8')
    const { logger, info, error } = captureLogger()

    const res = await runInjectMetadata(['a.qmd', 'missing.qmd', 'style.css'], logger, dir)

    expect(res).toEqual({ updated: ['a.qmd'], missing: ['missing.qmd'] })
    expect(await fs.readFile(path.join(dir, 'a.qmd'), 'utf8')).toBe('---\npreview-changed: true\n---\nBody\n')
    expect(await fs.readFile(path.join(dir, 'style.css'), 'utf8')).toBe('p{}')
    expect(info).toEqual(['Injected preview metadata into a.qmd'])
    expect(error).toEqual(['Warning: File not found: missing.qmd'])
  })
})
