import { describe, expect, it } from 'vitest'
import { highlightDocument, splitElement } from '../../src/lib/highlight'
import type { MatchStrategy } from '../../src/lib/types'

const page = (main: string) => `<html><head><title>t</title></head><body><main>${main}</main></body></html>`

describe('highlightDocument', () => {
  it('marks a single inserted word in a modified paragraph', () => {
    const res = highlightDocument(page('<p>The quick brown fox jumps.</p>'), page('<p>The quick fox jumps.</p>'))
    expect(res.classifications).toEqual(['modified'])
    expect(res.matches[0].similarity).toBeCloseTo(40 / 46, 6)
    expect(res.html).toBe(page('<p>The quick <span class="preview-added">brown</span> fox jumps.</p>'))
    expect(res.notes).toEqual([])
  })

  it('wraps every block as added when the old page has none', () => {
    const res = highlightDocument(page('<p>One</p><p>Two</p>'), page(''))
    expect(res.counts).toEqual({ unchanged: 0, modified: 0, added: 2 })
    expect(res.html).toBe(
      page('<p><span class="preview-added">One</span></p><p><span class="preview-added">Two</span></p>')
    )
  })

  it('treats a missing prior version as all added', () => {
    const res = highlightDocument(page('<h2>Title</h2>'), null)
    expect(res.html).toBe(page('<h2><span class="preview-added">Title</span></h2>'))
    expect(res.notes).toEqual([{ kind: 'missing_prior_version' }])
    expect(res.oldRegion).toBeNull()
  })

  it('leaves an identical page untouched', () => {
    const html = page('<h2>Intro</h2>\n<p>Same <em>text</em>.</p>\n<ul><li>Item</li></ul>')
    const res = highlightDocument(html, html)
    expect(res.html).toBe(html)
    expect(res.counts).toEqual({ unchanged: 3, modified: 0, added: 0 })
  })

  it('only rewrites the markup of changed blocks', () => {
    const oldHtml = page('\n  <div class="x"><p>Keep <b>this</b></p>\n</div>')
    const newHtml = page('\n  <div class="x"><p>Keep <b>this</b></p>\n<p>New para here</p></div>')
    const res = highlightDocument(newHtml, oldHtml)
    expect(res.html).toBe(
      page('\n  <div class="x"><p>Keep <b>this</b></p>\n<p><span class="preview-added">New para here</span></p></div>')
    )
  })

  it('edits duplicated markup by position', () => {
    const res = highlightDocument(page('<p>Alpha one</p><p>Alpha one</p>'), page('<p>Alpha one</p>'))
    expect(res.classifications).toEqual(['unchanged', 'added'])
    expect(res.html).toBe(page('<p>Alpha one</p><p><span class="preview-added">Alpha one</span></p>'))
  })

  it('keeps entities of added blocks as written', () => {
    const res = highlightDocument(page('<p>Fish &amp; chips</p>'), null)
    expect(res.html).toBe(page('<p><span class="preview-added">Fish &amp; chips</span></p>'))
  })

  it('renders a modified block from its plain text', () => {
    const res = highlightDocument(
      page('<p>Read the <a href="x">manual</a> now.</p>'),
      page('<p>Read the <a href="x">guide</a> now.</p>')
    )
    expect(res.classifications).toEqual(['modified'])
    expect(res.html).toBe(
      page('<p>Read the <span class="preview-changed" title="Previously: guide">manual</span> now.</p>')
    )
  })

  it('keeps an implicitly closed element as is and notes it', () => {
    const res = highlightDocument('<p>Unclosed para<p>Closed one</p>', null)
    expect(res.html).toBe('<p>Unclosed para<p><span class="preview-added">Closed one</span></p>')
    expect(res.notes).toContainEqual({ kind: 'malformed_element', blockId: 'b_0001', position: 0 })
    expect(res.notes).toContainEqual({ kind: 'extraction_miss', side: 'new' })
  })

  it('notes when either page has no main container', () => {
    const res = highlightDocument('<p>x</p>', '<p>x</p>')
    expect(res.notes).toEqual([
      { kind: 'extraction_miss', side: 'new' },
      { kind: 'extraction_miss', side: 'old' }
    ])
    expect(res.html).toBe('<p>x</p>')
  })

  it('marks each text of a nested list without flattening it', () => {
    const res = highlightDocument(page('<ul><li>Parent<ul><li>Child one</li><li>Child two</li></ul></li></ul>'), null)
    expect(res.html).toBe(
      page(
        '<ul><li><span class="preview-added">Parent</span><ul>' +
          '<li><span class="preview-added">Child one</span></li>' +
          '<li><span class="preview-added">Child two</span></li></ul></li></ul>'
      )
    )
  })

  it('keeps inline markup inside added spans', () => {
    const res = highlightDocument(page('<p>\n  See <a href="x">the guide</a>.\n</p>'), null)
    expect(res.html).toBe(page('<p>\n  <span class="preview-added">See <a href="x">the guide</a>.</span>\n</p>'))
  })

  it('only rewrites the changed paragraph of a quote', () => {
    const res = highlightDocument(
      page('<blockquote><p>First para.</p><p>Second new para.</p></blockquote>'),
      page('<blockquote><p>First para.</p><p>Second para.</p></blockquote>')
    )
    expect(res.classifications).toEqual(['modified'])
    expect(res.html).toBe(
      page('<blockquote><p>First para.</p><p>Second <span class="preview-added">new</span> para.</p></blockquote>')
    )
  })

  it('does not mark the preview banner as content', () => {
    const banner = '<div class="preview-changed-banner"><p>This page has changed.</p></div>'
    const html = page(`${banner}<p>Body text stays.</p>`)
    const res = highlightDocument(html, page('<p>Body text stays.</p>'))
    expect(res.classifications).toEqual(['unchanged'])
    expect(res.html).toBe(html)
  })

  it('leaves a block as is when highlighting it fails', () => {
    const broken: MatchStrategy = {
      name: 'broken',
      match: (_old, next) => next.map((_, i) => ({ newIndex: i, oldIndex: 7, similarity: 0.8 }))
    }
    const html = page('<p>Only</p>')
    const res = highlightDocument(html, html, { matcher: broken })
    expect(res.html).toBe(html)
    expect(res.classifications).toEqual(['unchanged'])
    expect(res.notes).toEqual([
      { kind: 'element_failed', blockId: 'b_0001', position: 0, message: 'No old block at index 7' }
    ])
  })

  it('uses an injected match strategy', () => {
    const noMatches: MatchStrategy = {
      name: 'none',
      match: (_old, next) => next.map((_, i) => ({ newIndex: i, oldIndex: null, similarity: 0 }))
    }
    const res = highlightDocument(page('<p>Same</p>'), page('<p>Same</p>'), { matcher: noMatches })
    expect(res.html).toBe(page('<p><span class="preview-added">Same</span></p>'))
  })

  it('honours threshold overrides', () => {
    const res = highlightDocument(page('<p>The quick brown fox jumps.</p>'), page('<p>The quick fox jumps.</p>'), {
      thresholds: { unchangedSimilarity: 0.8 }
    })
    expect(res.classifications).toEqual(['unchanged'])
    expect(res.html).toBe(page('<p>The quick brown fox jumps.</p>'))
  })
})

describe('splitElement', () => {
  it('splits open tag, content and close tag', () => {
    expect(splitElement('<p class="a">x <b>y</b></p>', 'p')).toEqual({
      open: '<p class="a">',
      inner: 'x <b>y</b>',
      close: '</p>'
    })
  })

  it('returns null for markup that is not a closed element of the tag', () => {
    expect(splitElement('<p>x', 'p')).toBeNull()
    expect(splitElement('<pre>x</pre>', 'p')).toBeNull()
  })
})
