import { useStatementStore } from '../../store/statementStore.ts'
import { useInterview } from '../../interview/useInterview.ts'
import type { Asset, Vehicle } from '../../model/types.ts'
import { ASSET_TERMS } from '../../income/terms.ts'
import type { Terms } from '../../income/terms.ts'
import { TIMES_PER_YEAR_LIST, recentYears } from '../../income/frequency.ts'
import { assetListEquity, assetListMarketValue } from '../../income/lists.ts'
import { yearMakeModel } from '../../income/periodic.ts'
import { RepeatableSection } from '../components/RepeatableSection.tsx'
import { CurrencyInput } from '../components/CurrencyInput.tsx'
import { Button } from '../components/Button.tsx'
import { FrequencySelect, TermSelect, TextField, TotalLine, totalText } from '../components/FormFields.tsx'
import { InterviewNav } from './InterviewNav.tsx'

// Vehicles have their own list below
const NON_VEHICLE_TERMS: Terms = Object.fromEntries(
  Object.entries(ASSET_TERMS).filter(([source]) => source !== 'vehicle'),
)

const YEARS: Terms = Object.fromEntries(recentYears(40).map((y) => [String(y), String(y)]))

export function AssetsPage() {
  const assets = useStatementStore((s) => s.statement.assets)
  const vehicles = useStatementStore((s) => s.statement.vehicles)
  const addRecord = useStatementStore((s) => s.addRecord)
  const updateRecord = useStatementStore((s) => s.updateRecord)
  const removeRecord = useStatementStore((s) => s.removeRecord)
  const markComplete = useStatementStore((s) => s.markComplete)
  const interview = useInterview()

  const updateAsset = (id: string, updates: Partial<Asset>) => updateRecord('assets', id, { ...updates, complete: false })
  const updateVehicle = (id: string, updates: Partial<Vehicle>) => updateRecord('vehicles', id, { ...updates, complete: false })

  const everything: Asset[] = [...assets, ...vehicles]

  return (
    <div data-testid="page-assets" className="max-w-xl mx-auto">
      <h1 className="text-2xl font-bold text-gray-900">What you own</h1>
      <p className="mt-1 text-sm text-gray-600">
        Include bank accounts, property and vehicles. Leave the income blank for things that earn nothing.
      </p>

      <div className="mt-6 flex flex-col gap-8">
        <RepeatableSection
          label="Accounts and property"
          items={assets}
          addLabel="Add asset"
          emptyMessage="No assets added yet."
          onAdd={() => addRecord('assets', { id: crypto.randomUUID(), source: '', marketValue: 0 })}
          onRemove={(id) => removeRecord('assets', id)}
          renderItem={(asset) => (
            <div className="flex flex-col gap-3">
              <TermSelect
                label="Kind of asset"
                terms={NON_VEHICLE_TERMS}
                value={asset.source}
                onChange={(source) => updateAsset(asset.id, { source })}
              />
              <CurrencyInput
                label="What it is worth"
                value={asset.marketValue}
                onChange={(marketValue) => updateAsset(asset.id, { marketValue })}
              />
              <CurrencyInput
                label="Balance or amount still owed"
                value={asset.balance ?? 0}
                onChange={(balance) => updateAsset(asset.id, { balance })}
              />
              <CurrencyInput
                label="Income it earns (interest, rent)"
                value={asset.value ?? 0}
                onChange={(value) => updateAsset(asset.id, { value, timesPerYear: asset.timesPerYear ?? 12 })}
              />
              {asset.value !== undefined && asset.value > 0 && (
                <FrequencySelect
                  options={TIMES_PER_YEAR_LIST}
                  value={asset.timesPerYear ?? 12}
                  onChange={(timesPerYear) => updateAsset(asset.id, { timesPerYear })}
                />
              )}
              <TextField
                label="Who owns it?"
                value={asset.owner ?? ''}
                onChange={(owner) => updateAsset(asset.id, { owner })}
              />
              {!asset.complete && (
                <Button size="sm" className="self-start" disabled={!asset.source} onClick={() => markComplete('assets', asset.id)}>
                  Done
                </Button>
              )}
            </div>
          )}
        />

        <RepeatableSection
          label="Vehicles"
          items={vehicles}
          addLabel="Add vehicle"
          emptyMessage="No vehicles added yet."
          onAdd={() =>
            addRecord('vehicles', { id: crypto.randomUUID(), source: 'vehicle', marketValue: 0, year: '', make: '', model: '' })
          }
          onRemove={(id) => removeRecord('vehicles', id)}
          renderItem={(vehicle) => (
            <div className="flex flex-col gap-3">
              <TermSelect
                label="Year"
                terms={YEARS}
                value={String(vehicle.year)}
                onChange={(year) => updateVehicle(vehicle.id, { year: year === '' ? '' : Number(year) })}
              />
              <TextField label="Make" value={vehicle.make} onChange={(make) => updateVehicle(vehicle.id, { make })} />
              <TextField label="Model" value={vehicle.model} onChange={(model) => updateVehicle(vehicle.id, { model })} />
              <CurrencyInput
                label="What it is worth"
                value={vehicle.marketValue}
                onChange={(marketValue) => updateVehicle(vehicle.id, { marketValue })}
              />
              <CurrencyInput
                label="Loan balance"
                value={vehicle.balance ?? 0}
                onChange={(balance) => updateVehicle(vehicle.id, { balance })}
              />
              {vehicle.complete ? (
                <p className="text-xs text-emerald-700">Saved: {yearMakeModel(vehicle)}</p>
              ) : (
                <Button size="sm" className="self-start" disabled={!vehicle.make} onClick={() => markComplete('vehicles', vehicle.id)}>
                  Done
                </Button>
              )}
            </div>
          )}
        />

        {everything.length > 0 && (
          <div className="flex flex-col gap-1">
            <TotalLine label="Total value" amount={totalText(() => assetListMarketValue(everything))} testId="assets-market-value" />
            <TotalLine label="Total equity" amount={totalText(() => assetListEquity(everything))} testId="assets-equity" />
          </div>
        )}
      </div>

      <InterviewNav interview={interview} />
    </div>
  )
}
