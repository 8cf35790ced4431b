import type { LabeledExample } from '../src/utils/IO';

export const sentimentCorpus: LabeledExample[] = [
    { text: 'eu te adoro', label: 'bom' },
    { text: 'eu te amo', label: 'bom' },
    { text: 'eu amo batatas fritas', label: 'bom' },
    { text: 'eu amo bolo', label: 'bom' },
    { text: 'voce é demais', label: 'bom' },
    { text: 'bolo que é demais', label: 'bom' },
    { text: 'peixe é ruim', label: 'ruim' },
    { text: 'eu te odeio', label: 'ruim' },
    { text: 'eu quero ver queimar', label: 'ruim' },
    { text: 'eu quero é que se exploda', label: 'ruim' },
    { text: 'eu acho que isso é muito ruim', label: 'ruim' },
    { text: 'odeio ficar parado', label: 'ruim' },
];
