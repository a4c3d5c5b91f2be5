import { fireEvent, render, screen } from '@testing-library/react';
import { EnergyStep } from '@/components/steps/EnergyStep';
import type { CatProfile, EnergyResult } from '@/lib/types';

const profile: CatProfile = { weightKg: 4, ageMonths: 24, neutered: true, bcs: 5, pregnant: false, lactating: false };
const energy: EnergyResult = { rer: 200, multiplier: 1.2, der: 240, waterIntakeMl: 240 };

describe('EnergyStep', () => {
  it('submits the form defaults as numbers', () => {
    const onSubmit = jest.fn();
    render(<EnergyStep profile={null} energy={null} onSubmit={onSubmit} />);

    fireEvent.click(screen.getByRole('button', { name: /計算貓咪每日所需熱量/ }));

    expect(onSubmit).toHaveBeenCalledWith({
      weightKg: 4,
      ageYears: 2,
      ageMonthsPart: 0,
      neutered: true,
      bcs: 5,
      pregnant: false,
      lactating: false,
    });
  });

  it('submits edited values', () => {
    const onSubmit = jest.fn();
    render(<EnergyStep profile={null} energy={null} onSubmit={onSubmit} />);

    fireEvent.change(screen.getByLabelText('體重 (公斤)'), { target: { value: '5.5' } });
    fireEvent.change(screen.getByLabelText('年齡 (歲)'), { target: { value: '0' } });
    fireEvent.change(screen.getByLabelText('年齡 (個月)'), { target: { value: '9' } });
    fireEvent.click(screen.getByLabelText('否'));
    fireEvent.change(screen.getByRole('slider'), { target: { value: '7' } });
    fireEvent.click(screen.getByLabelText('母貓是否哺乳中？'));
    fireEvent.click(screen.getByRole('button', { name: /計算貓咪每日所需熱量/ }));

    expect(onSubmit).toHaveBeenCalledWith({
      weightKg: 5.5,
      ageYears: 0,
      ageMonthsPart: 9,
      neutered: false,
      bcs: 7,
      pregnant: false,
      lactating: true,
    });
  });

  it('renders the computed energy with the life stage', () => {
    render(<EnergyStep profile={profile} energy={energy} onSubmit={jest.fn()} />);

    expect(screen.getByText('200.00 大卡/天')).toBeInTheDocument();
    expect(screen.getByText('1.2')).toBeInTheDocument();
    expect(screen.getByText('絕育成貓')).toBeInTheDocument();
    expect(screen.getByText('240.00 大卡/天')).toBeInTheDocument();
    expect(screen.getByText('240 毫升/天')).toBeInTheDocument();
  });

  it('renders the step error', () => {
    render(
      <EnergyStep
        profile={null}
        energy={null}
        error={{ code: 'invalid_input', message: '體重必須大於零。' }}
        onSubmit={jest.fn()}
      />
    );

    expect(screen.getByRole('alert')).toHaveTextContent('體重必須大於零。');
    expect(screen.queryByText('📈 計算結果')).not.toBeInTheDocument();
  });
});
