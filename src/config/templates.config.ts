import { registerAs } from '@nestjs/config';
import { TemplateDescriptor } from '../types/presentation';

export const DEFAULT_TEMPLATE_ID = 'default';

export interface TemplatesConfig {
  directory: string;
  catalog: TemplateDescriptor[];
}

// Layout 0 is the cover; content slides cycle through 1, 2, 3.
const catalog: TemplateDescriptor[] = [
  {
    id: DEFAULT_TEMPLATE_ID,
    name: 'Default',
    description: 'Clean, professional business style',
    file: 'default.pptx',
    coverLayout: 0,
    contentLayouts: [1, 2, 3],
  },
  {
    id: 'blue',
    name: 'Blue Business',
    description: 'Professional business style with a blue theme',
    file: 'blue.pptx',
    coverLayout: 0,
    contentLayouts: [1, 2, 3],
  },
  {
    id: 'green',
    name: 'Green Nature',
    description: 'Fresh style with a green theme',
    file: 'green.pptx',
    coverLayout: 0,
    contentLayouts: [1, 2, 3],
  },
  {
    id: 'red',
    name: 'Red Energy',
    description: 'Vivid style with a red theme',
    file: 'red.pptx',
    coverLayout: 0,
    contentLayouts: [1, 2, 3],
  },
  {
    id: 'dark',
    name: 'Dark Professional',
    description: 'Professional style on a dark background',
    file: 'dark.pptx',
    coverLayout: 0,
    contentLayouts: [1, 2, 3],
  },
];

export default registerAs('templates', (): TemplatesConfig => ({
  directory: process.env.TEMPLATES_DIR || 'templates',
  catalog,
}));
