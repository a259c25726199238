import '../env.js'
import { main } from './main.js'

main(process.argv.slice(2))
  .then(exitCode => {
    process.exitCode = exitCode
  })
  .catch(error => {
    console.error(error instanceof Error ? error.message : String(error))
    process.exitCode = 1
  })
