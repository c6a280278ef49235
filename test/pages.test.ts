import { describe, it, expect, afterEach } from 'vitest'
import { Text } from '../src/components'
import { Page, globalPageMap, listPages, registerPage } from '../src/pages'

function home() {
  return new Text('home')
}

function layoutHome() {
  return new Text('home')
}

function layoutHomePage() {
  return new Text('home page')
}

function layout_about_us() {
  return null
}

describe('Page', () => {
  it('should infer the path and name from the layout', () => {
    expect(new Page(layoutHome)).toMatchObject({ path: '/home', name: 'Home', order: 0, redirectFrom: [] })
    expect(new Page(home)).toMatchObject({ path: '/home', name: 'Home' })
    expect(new Page(layoutHomePage)).toMatchObject({ path: '/home_page', name: 'Home Page' })
    expect(new Page(layout_about_us)).toMatchObject({ path: '/about_us', name: 'About Us' })
  })

  it('should add a leading slash to explicit paths', () => {
    expect(new Page(layoutHome, { path: 'casa' })).toMatchObject({ path: '/casa', name: 'Casa' })
  })

  it('should keep explicit names and redirects', () => {
    const page = new Page(layoutHome, { path: '/', name: 'Start', order: 2, redirectFrom: '/v1/home' })

    expect(page).toMatchObject({ path: '/', name: 'Start', order: 2, redirectFrom: ['/v1/home'] })
    expect(page.paths).toEqual(['/', '/v1/home'])
  })

  it('should require a path for anonymous layouts', () => {
    expect(() => new Page(() => null)).toThrow('has no usable name, a path is required')
  })
})

describe('registerPage', () => {
  afterEach(() => {
    globalPageMap.clear()
  })

  it('should register into the global page map by default', () => {
    const page = registerPage(layoutHome)

    expect(globalPageMap.get('/home')).toBe(page)
  })

  it('should register every redirect path', () => {
    const pages = new Map<string, Page>()

    const page = registerPage(layoutHome, { redirectFrom: ['/v1/home', '/v2/home'] }, pages)

    expect([...pages.keys()]).toEqual(['/home', '/v1/home', '/v2/home'])
    expect(listPages(pages)).toEqual([page])
  })

  it('should override values of an existing page', () => {
    const pages = new Map<string, Page>()

    const page = registerPage(new Page(layoutHome), { path: 'start', name: 'Start' }, pages)

    expect(page).toMatchObject({ path: '/start', name: 'Start' })
    expect(pages.get('/start')).toBe(page)
  })

  it('should reject duplicate paths without changing the map', () => {
    const pages = new Map<string, Page>()
    registerPage(layoutHome, {}, pages)
    registerPage(layoutHomePage, { path: '/a', redirectFrom: '/old' }, pages)

    expect(() => registerPage(home, {}, pages)).toThrow('Duplicate page found for path: /home')
    expect(() => registerPage(layoutHomePage, { path: '/b', redirectFrom: '/old' }, pages))
      .toThrow('Duplicate page found for path: /old')
    expect(pages.has('/b')).toBe(false)
  })

  it('should list pages by order then path', () => {
    const pages = new Map<string, Page>()
    registerPage(layoutHomePage, { path: '/b' }, pages)
    registerPage(layoutHomePage, { path: '/a' }, pages)
    registerPage(layoutHome, { path: '/first', order: -1 }, pages)

    expect(listPages(pages).map(page => page.path)).toEqual(['/first', '/a', '/b'])
  })
})
