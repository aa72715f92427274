import { mkdirSync, mkdtempSync, realpathSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import path from 'node:path'

export type TempTree = ReturnType<typeof createTempTree>

/** Throwaway directory tree under the OS temp dir, rooted at a canonical path. */
export const createTempTree = () => {
  const root = realpathSync(mkdtempSync(path.join(tmpdir(), 'ft-')))

  const at = (rel: string) => path.join(root, ...rel.split('/'))

  const file = (rel: string, content = '') => {
    const target = at(rel)
    mkdirSync(path.dirname(target), { recursive: true })
    writeFileSync(target, content)
    return target
  }

  const dir = (rel: string) => {
    const target = at(rel)
    mkdirSync(target, { recursive: true })
    return target
  }

  const remove = (rel: string) => rmSync(at(rel), { recursive: true, force: true })

  // README.md, main.rs, .gitkeep, src/{lib.rs,module.rs,nested/deep/file.txt}, empty/
  const nested = () => {
    file('README.md', '# Test Project\nThis is a readme.')
    file('main.rs', 'fn main() { println!("hello"); }')
    file('.gitkeep')
    file('src/lib.rs', 'pub fn helper() {}')
    file('src/module.rs', 'mod tests { /* ... */ }')
    file('src/nested/deep/file.txt', 'deep content')
    dir('empty')
  }

  const cleanup = () => rmSync(root, { recursive: true, force: true })

  return { root, at, file, dir, remove, nested, cleanup }
}
