import { z } from 'zod';

export const ProjectSchema = z.object({
  id: z.string(),
  name: z.string(),
  technicalName: z.string().nullish(),
  displayName: z.string().nullish(),
  description: z.string().nullish(),
  creationDate: z.string().nullish(),
  numberOfHubs: z.number().nullish(),
  numberOfSources: z.number().nullish(),
  numberOfDataQualityControls: z.number().nullish(),
});
export type Project = z.infer<typeof ProjectSchema>;
