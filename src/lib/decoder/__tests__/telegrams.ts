import type { MeterEnvelope } from '../types'
import { parseHex } from '../hex'

// Decrypted application payloads, i.e. everything after the short TPL header.

export const C5ISF_T1B = parseHex(
  '2F2F04061A0000000413C20800008404060000000082046CC121043BA4000000042D1900000002591216025DE210'
  + '02FD17000084800106000000008280016CC121948001AE25000000002F2F2F2F2F2F',
)

export const C5ISF_T1A1 = parseHex(
  '04060000000004130000000002FD17240084800106000000008280016C2124C480010600000080C280016CFFFF'
  + '84810106000000808281016CFFFFC481010600000080C281016CFFFF84820106000000808282016CFFFF'
  + 'C482010600000080C282016CFFFF84830106000000808283016CFFFFC483010600000080C283016CFFFF'
  + '84840106000000808284016CFFFFC484010600000080C284016CFFFF84850106000000808285016CFFFF'
  + 'C485010600000080C285016CFFFF84860106000000808286016CFFFFC486010600000080C286016CFFFF',
)

export const C5ISF_T1A2 = parseHex(
  '04140000000084800114000000008280016C2124C480011400000080C280016CFFFF84810114000000808281016CFFFF'
  + 'C481011400000080C281016CFFFF84820114000000808282016CFFFFC482011400000080C282016CFFFF'
  + '84830114000000808283016CFFFFC483011400000080C283016CFFFF84840114000000808284016CFFFF'
  + 'C484011400000080C284016CFFFF84850114000000808285016CFFFFC485011400000080C285016CFFFF'
  + '84860114000000808286016CFFFFC486011400000080C286016CFFFF',
)

export const ULTRIMIS = parseHex('2F2F0413320C000003FD170C0C0C44132109000004933C05000000')

export function c5isfEnvelope(type: number): MeterEnvelope {
  return { manufacturer: 'ZRI', id: '55445555', version: 0x88, type }
}

export const ULTRIMIS_ENVELOPE: MeterEnvelope = { manufacturer: 'APA', id: '12345678', version: 0x01, type: 0x16 }
