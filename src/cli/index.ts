/**
 * deepsky-calc CLI
 *
 * Commands:
 *   deepsky-calc contrast <sqm> <aperture> <magnification> <magnitude> <d1> <d2>
 *   deepsky-calc optimal <sqm> <aperture> <magnitude> <d1> <d2> <m1,m2,...>
 *   deepsky-calc sky sqm|nelm|bortle <value>
 *   deepsky-calc equipment instruments|eyepieces|lenses|filters <username>
 *   deepsky-calc instrument-type <name|code>
 */

import {
  contrastReserve,
  optimalDetectionMagnification,
  rateContrastReserve,
} from '../contrast/index.js'
import {
  sqmToNelm,
  sqmToBortle,
  nelmToSqm,
  nelmToBortle,
  bortleToSqm,
  bortleToNelm,
} from '../sky/index.js'
import { instrumentTypeToInt, instrumentTypeToString } from '../instruments/index.js'
import { getEquipment } from '../api/index.js'
import type { EquipmentResource } from '../types.js'

const args = process.argv.slice(2)
const command = args[0]

const EQUIPMENT_COMMANDS = new Map<string, EquipmentResource>([
  ['instruments', 'instrument'],
  ['eyepieces', 'eyepieces'],
  ['lenses', 'lenses'],
  ['filters', 'filters'],
])

async function main() {
  switch (command) {
    case 'contrast':
      cmdContrast(args.slice(1))
      break
    case 'optimal':
      cmdOptimal(args.slice(1))
      break
    case 'sky':
      cmdSky(args[1], args[2])
      break
    case 'equipment':
      await cmdEquipment(args[1], args[2])
      break
    case 'instrument-type':
      cmdInstrumentType(args.slice(1).join(' '))
      break
    default:
      printHelp()
      process.exit(command ? 1 : 0)
  }
}

function printHelp() {
  console.log(`deepsky-calc — Deep-sky visibility calculator

Commands:
  contrast <sqm> <aperture> <magnification> <magnitude> <d1> <d2>
                                  Contrast reserve (aperture in mm, diameters in arcsec)
  optimal <sqm> <aperture> <magnitude> <d1> <d2> <m1,m2,...>
                                  Best magnification among the candidates
  sky sqm|nelm|bortle <value>     Convert between SQM, NELM and Bortle class
  equipment <kind> <username>     List DeepskyLog equipment (instruments, eyepieces, lenses, filters)
  instrument-type <name|code>     Convert an instrument type name to its code or back

Examples:
  deepsky-calc contrast 21.2 250 100 8.4 660 420
  deepsky-calc optimal 21.2 250 8.4 660 420 50,100,150,200,250
  deepsky-calc sky sqm 21.3
  deepsky-calc equipment instruments alice
  deepsky-calc instrument-type Reflector`)
}

/** Parse positional numbers, exiting with a usage line on the first bad one. */
function parseNumbers(values: string[], count: number, usage: string): number[] {
  const numbers = values.slice(0, count).map(v => parseFloat(v))
  if (numbers.length < count || numbers.some(n => isNaN(n))) {
    console.error(`Usage: deepsky-calc ${usage}`)
    process.exit(1)
  }
  return numbers
}

function cmdContrast(cmdArgs: string[]) {
  const [sqm, aperture, magnification, magnitude, diameter1, diameter2] = parseNumbers(
    cmdArgs, 6, 'contrast <sqm> <aperture> <magnification> <magnitude> <d1> <d2>',
  )
  const reserve = contrastReserve(sqm, aperture, magnification, { magnitude, diameter1, diameter2 })
  const rating = rateContrastReserve(reserve)

  console.log(`Contrast reserve: ${reserve.toFixed(3)}`)
  console.log(`Visibility:       ${rating.description}`)
}

function cmdOptimal(cmdArgs: string[]) {
  const usage = 'optimal <sqm> <aperture> <magnitude> <d1> <d2> <m1,m2,...>'
  const [sqm, aperture, magnitude, diameter1, diameter2] = parseNumbers(cmdArgs, 5, usage)
  const list = (cmdArgs[5] ?? '').split(',')
  const magnifications = parseNumbers(list, list.length, usage)

  const target = { magnitude, diameter1, diameter2 }
  const best = optimalDetectionMagnification(sqm, aperture, target, magnifications)

  for (const m of magnifications) {
    const reserve = contrastReserve(sqm, aperture, m, target)
    const marker = m === best ? '  <- best' : ''
    console.log(`${m.toFixed(0).padStart(5)}×  ${reserve.toFixed(3).padStart(7)}  ${rateContrastReserve(reserve).description}${marker}`)
  }
}

function cmdSky(kind?: string, valueStr?: string) {
  const value = parseFloat(valueStr ?? '')
  if (isNaN(value)) {
    console.error('Usage: deepsky-calc sky sqm|nelm|bortle <value>')
    process.exit(1)
  }

  switch (kind) {
    case 'sqm':
      console.log(`SQM:    ${value.toFixed(2)}`)
      console.log(`NELM:   ${sqmToNelm(value).toFixed(2)}`)
      console.log(`Bortle: ${sqmToBortle(value)}`)
      break
    case 'nelm':
      console.log(`NELM:   ${value.toFixed(2)}`)
      console.log(`SQM:    ${nelmToSqm(value).toFixed(2)}`)
      console.log(`Bortle: ${nelmToBortle(value)}`)
      break
    case 'bortle':
      console.log(`Bortle: ${value}`)
      console.log(`SQM:    ${bortleToSqm(value).toFixed(2)}`)
      console.log(`NELM:   ${bortleToNelm(value).toFixed(2)}`)
      break
    default:
      console.error('Usage: deepsky-calc sky sqm|nelm|bortle <value>')
      process.exit(1)
  }
}

async function cmdEquipment(kind?: string, username?: string) {
  const resource = kind ? EQUIPMENT_COMMANDS.get(kind) : undefined
  if (!resource || !username) {
    console.error('Usage: deepsky-calc equipment instruments|eyepieces|lenses|filters <username>')
    process.exit(1)
  }

  const items = await getEquipment(resource, username)
  if (items.size === 0) {
    console.log(`No ${kind} registered for ${username}.`)
    return
  }
  for (const [id, record] of items) {
    const name = typeof record.name === 'string' && record.name ? record.name : '(unnamed)'
    console.log(`${String(id).padStart(6)}  ${name}`)
  }
}

function cmdInstrumentType(value: string) {
  if (!value) {
    console.error('Usage: deepsky-calc instrument-type <name|code>')
    process.exit(1)
  }
  const code = Number(value)
  if (Number.isInteger(code)) {
    console.log(instrumentTypeToString(code))
  } else {
    console.log(instrumentTypeToInt(value))
  }
}

main().catch(err => {
  console.error(err instanceof Error ? err.message : String(err))
  process.exit(1)
})
