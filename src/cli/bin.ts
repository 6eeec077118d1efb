import { log } from '@shared/logger'
import { getErrorMessage } from '../node/shared/errors'
import { main } from './main'

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code
  })
  .catch((error: unknown) => {
    log.error(`Error: ${getErrorMessage(error)}`)
    process.exitCode = 1
  })
