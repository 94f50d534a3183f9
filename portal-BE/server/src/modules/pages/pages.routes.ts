import { Router } from 'express'
import type { AppConfig } from '../../config/app-config'
import { renderInfoPage, type InfoPageKey } from './page.templates'
import { pageContext } from './page-context'

const INFO_ROUTES: Array<[path: string, page: InfoPageKey]> = [
  ['/terms/data-collection', 'data-collection'],
  ['/terms/communication', 'communication'],
  ['/terms/recruitment', 'recruitment'],
  ['/privacy', 'privacy'],
  ['/submit', 'submit']
]

export function buildPagesRouter(config: Pick<AppConfig, 'cookieSecure'>) {
  const router = Router()
  const cookie = { secure: config.cookieSecure }

  for (const [path, page] of INFO_ROUTES) {
    router.get(path, (req, res) => {
      res.type('html').send(renderInfoPage(page, pageContext(req, res, cookie)))
    })
  }

  return router
}
