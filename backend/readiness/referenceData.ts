import type { RecordValues } from './model';

/** The standard nine-step TRL scale. */
export const READINESS_LEVELS: readonly RecordValues<'technical_readiness_level'>[] =
  [
    {
      level: 1,
      name: 'Basic principles observed',
      description:
        'Scientific research begins to be translated into applied research and development',
    },
    {
      level: 2,
      name: 'Technology concept formulated',
      description: 'Practical applications can be invented',
    },
    {
      level: 3,
      name: 'Experimental proof of concept',
      description: 'Active research and development is initiated',
    },
    {
      level: 4,
      name: 'Technology validated in lab',
      description: 'Basic technological components are integrated',
    },
    {
      level: 5,
      name: 'Technology validated in environment',
      description:
        'Technology components are integrated with realistic supporting elements',
    },
    {
      level: 6,
      name: 'Technology demonstrated in environment',
      description:
        'Representative model or prototype system is tested in a relevant environment',
    },
    {
      level: 7,
      name: 'System prototype demonstrated',
      description: 'Prototype near or at planned operational system',
    },
    {
      level: 8,
      name: 'System complete and qualified',
      description:
        'Technology has been proven to work in its final form and under expected conditions',
    },
    {
      level: 9,
      name: 'Actual system proven in operational environment',
      description: 'Actual application of technology in its final form',
    },
  ];
