import { z } from 'zod';

const colourSchema = z.number().int().min(0).max(0xffffffff);

export const barSchema = z.object({
  open: z.number().finite(),
  high: z.number().finite(),
  low: z.number().finite(),
  close: z.number().finite(),
});

export const marginSchema = z.object({
  top: z.number().int().min(0),
  bottom: z.number().int().min(0),
  left: z.number().int().min(0),
  right: z.number().int().min(0),
});

export const axisOptionsSchema = z.object({
  lineColour: colourSchema.default(0xddddddff),
  lineFrequency: z.number().finite().default(0),
  labelFrequency: z.number().int().min(0).default(0),
});

export const chartSettingsSchema = z
  .object({
    title: z.string().default(''),
    textColour: colourSchema.default(0x000000ff),
    valuePrefix: z.string().default(''),
    valueSuffix: z.string().default(''),
    // seconds represented by one bar
    timeUnits: z.number().positive().default(3600),
    hAxis: axisOptionsSchema.default({}),
    vAxis: axisOptionsSchema.default({}),
    downColour: colourSchema.default(0xff0000ff),
    upColour: colourSchema.default(0x00ff00ff),
    backgroundColour: colourSchema.default(0xffffffff),
    currentValueColour: colourSchema.default(0x0000ffff),
    width: z.number().int().positive().max(8192).default(1280),
    height: z.number().int().positive().max(8192).default(720),
    margin: marginSchema.default({ top: 40, bottom: 30, left: 80, right: 60 }),
  })
  .refine((s) => s.margin.left + s.margin.right < s.width, {
    message: 'horizontal margins leave no drawable width',
    path: ['margin'],
  })
  .refine((s) => s.margin.top + s.margin.bottom < s.height, {
    message: 'vertical margins leave no drawable height',
    path: ['margin'],
  });

export type ChartSettings = z.infer<typeof chartSettingsSchema>;
export type ChartSettingsInput = z.input<typeof chartSettingsSchema>;

export const indicatorSpecSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('bollinger'),
    periods: z.number().int().positive().default(20),
    deviations: z.number().positive().default(2),
    colour: colourSchema.default(0x7f7f7fff),
  }),
  z.object({
    type: z.literal('ema'),
    period: z.number().int().positive().default(20),
    colour: colourSchema.default(0xff8c00ff),
  }),
]);

export type IndicatorSpec = z.infer<typeof indicatorSpecSchema>;

export const renderRequestSchema = z.object({
  bars: z.array(barSchema),
  settings: chartSettingsSchema.default({}),
  indicators: z.array(indicatorSpecSchema).default([]),
});

export type RenderRequest = z.infer<typeof renderRequestSchema>;
