import * as protobuf from 'protobufjs/minimal'
import { z } from 'zod'
import { PatternDecodeError } from './errors'
import type { Coordinate } from './universe'

// Base64url helpers
function toBase64Url(bytes: Uint8Array): string {
  let binary = ''
  for (let i = 0; i < bytes.length; i += 1) binary += String.fromCharCode(bytes[i])
  const b64 = btoa(binary)
  return b64.replace(/\+/g, '-').replace(/\//g, '_').replace(/=+$/g, '')
}

function fromBase64Url(s: string): Uint8Array {
  let b64 = s.replace(/-/g, '+').replace(/_/g, '/')
  while (b64.length % 4 !== 0) b64 += '='
  const binary = atob(b64)
  const arr = new Uint8Array(binary.length)
  for (let i = 0; i < binary.length; i += 1) arr[i] = binary.charCodeAt(i)
  return arr
}

const JsonPatternSchema = z.object({
  cells: z.array(z.tuple([z.number().int(), z.number().int()])),
})

// message State { repeated sint32 cells = 1 [packed=true]; }
const CELLS_FIELD = 1
const LENGTH_DELIMITED = 2

/** Packs row/column pairs as [r0, c0, r1, c1, ...] and returns them base64url encoded. */
export function encodeCells(cells: Iterable<Coordinate>): string {
  const writer = protobuf.Writer.create()
  writer.uint32((CELLS_FIELD << 3) | LENGTH_DELIMITED).fork()
  for (const [r, c] of cells) writer.sint32(r).sint32(c)
  writer.ldelim()
  return toBase64Url(writer.finish())
}

function decodeProtobuf(param: string): Array<[number, number]> {
  const reader = protobuf.Reader.create(fromBase64Url(param))
  const values: number[] = []
  while (reader.pos < reader.len) {
    const tag = reader.uint32()
    const fieldNo = tag >>> 3
    const wireType = tag & 7
    if (fieldNo === CELLS_FIELD && wireType === LENGTH_DELIMITED) {
      const end = reader.uint32() + reader.pos
      while (reader.pos < end) values.push(reader.sint32())
    } else {
      reader.skipType(wireType)
    }
  }
  const out: Array<[number, number]> = []
  // an unpaired trailing value is dropped
  for (let i = 0; i + 1 < values.length; i += 2) out.push([values[i], values[i + 1]])
  return out
}

function decodeBase64Json(param: string): Array<[number, number]> {
  const json = new TextDecoder().decode(fromBase64Url(param))
  return JsonPatternSchema.parse(JSON.parse(json)).cells
}

function decodePercentJson(param: string): Array<[number, number]> {
  return JsonPatternSchema.parse(JSON.parse(decodeURIComponent(param))).cells
}

const decoders = [decodeProtobuf, decodeBase64Json, decodePercentJson]

/**
 * Reads a shared pattern. The protobuf form is tried first; older links
 * carried `{"cells": [[r, c], ...]}` as base64url or percent-encoded JSON.
 */
export function decodeCells(param: string): Array<[number, number]> {
  let lastError: unknown
  for (const decode of decoders) {
    try {
      return decode(param)
    } catch (err) {
      lastError = err
    }
  }
  throw new PatternDecodeError(param, lastError)
}
