export interface TemplateDescriptor {
  id: string;
  name: string;
  description: string;
  /** Template file, relative to the templates directory. */
  file: string;
  coverLayout: number;
  /** Content layouts, used in order and wrapped around. */
  contentLayouts: number[];
}

export interface SlideSpec {
  title: string;
  bullets: string[];
  layoutIndex: number;
}

export interface GeneratedOutline {
  title: string;
  outline: string;
}

export interface GeneratedFile {
  filename: string;
  url: string;
}

export interface HealthStatus {
  status: 'healthy';
  service: string;
  timestamp: string;
}
