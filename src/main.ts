#!/usr/bin/env node
import { ContourAssembler } from './contours/assembler'
import { EventReader } from './reader/base'
import { AssemblyOptions } from './types/contours'
import { FormatterOptions } from './types/paths'
import { PathWriter } from './writer/base'

export type TraceOptions = AssemblyOptions & FormatterOptions

export async function traceContourFile(
  inputPath: string,
  outputPath: string,
  options: TraceOptions = {}
): Promise<string> {
  // Read.
  const reader = new EventReader()
  const stream = await reader.readFile(inputPath)

  // Assemble.
  const assembler = new ContourAssembler(options)
  assembler.addAll(stream.events)
  const paths = assembler.finish()

  // Write.
  const writer = new PathWriter(options)
  return writer.formatAndWrite(paths, outputPath, stream.levels)
}

export function parseArgs(args: string[]): {
  inputFile?: string
  outputFile?: string
  options: TraceOptions
} {
  // Separate flags from file arguments.
  const flags = args.filter((arg) => arg.startsWith('--'))
  const fileArgs = args.filter((arg) => !arg.startsWith('--'))

  const options: TraceOptions = {
    quickExcision: !flags.includes('--no-quick')
  }
  const precisionFlag = flags.find((flag) => flag.startsWith('--precision='))
  if (precisionFlag) {
    options.precision = Number(precisionFlag.slice('--precision='.length))
  }

  const inputFile = fileArgs[0]
  // Default output file is input filename with a .paths.json suffix.
  const outputFile = inputFile
    ? fileArgs[1] || inputFile.replace(/\.[^/.]+$/, '') + '.paths.json'
    : undefined

  return { inputFile, outputFile, options }
}

async function main(): Promise<void> {
  const { inputFile, outputFile, options } = parseArgs(process.argv.slice(2))

  if (!inputFile || !outputFile) {
    console.log('Usage: contour-paths <inputFile> [outputFile] [--no-quick] [--precision=N]')
    console.log('Example: contour-paths ./segments.json ./segments.paths.json --precision=3')
    process.exitCode = 1
    return
  }

  try {
    await traceContourFile(inputFile, outputFile, options)
    console.log(`Successfully traced ${inputFile} to ${outputFile}`)
  } catch (error) {
    console.error('Tracing failed:', error instanceof Error ? error.message : error)
    process.exitCode = 1
  }
}

// Run the main function if this file is executed directly.
if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(error)
    process.exitCode = 1
  })
}
