// A JSON driver definition as a user would load it.
export const testWaterDefinition = {
  name: 'testwater',
  meterType: 'WaterMeter',
  detections: [{ manufacturer: 'ABC', version: 1, type: 7 }],
  fields: [
    { name: 'total', quantity: 'Volume', kind: 'numeric', match: { vifRange: 'Volume' }, print: ['json', 'field'] },
    {
      name: 'status',
      quantity: 'Text',
      kind: 'lookup',
      match: { difVifKey: '02fd17' },
      lookup: {
        name: 'FLAGS',
        unknownLabel: 'UNKNOWN',
        rules: [{ value: 1, label: 'LEAK' }, { value: 2, label: 'BURST' }],
      },
    },
  ],
}
