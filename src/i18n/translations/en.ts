export const en = {
  status: {
    particles: 'Particles',
    radius: 'Radius',
    seed: 'Seed',
    speed: 'Speed',
    scheme: 'Colors',
    mode: 'Mode',
    paused: 'PAUSED',
    complete: 'COMPLETE',
  },
  keys: {
    help: 'space pause · r reset · n/p seed · 1-0 pick seed · c colors · m mode · +/- speed · e export · q quit',
  },
  messages: {
    exported: 'Config exported to',
    resized: 'Simulation resized to',
    stopped: 'Simulation stopped',
  },
};
