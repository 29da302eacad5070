export * from './types';
export * from './storyFlow';
export * from './activeStory';
export * from './commands';
